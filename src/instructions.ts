/**
 * Instruction helpers - stack effects and body validation
 */

import type { Instruction, Method, StackEffect } from './types.js';

const VOID = 'System.Void';

/**
 * Raised when a method body cannot be interpreted. Rules catch it at their
 * boundary and skip the method.
 */
export class MalformedMethodBodyError extends Error {
  readonly method: string;
  readonly offset?: number;

  constructor(method: string, message: string, offset?: number) {
    const at = offset === undefined ? '' : ` at ${formatOffset(offset)}`;
    super(`${method}: ${message}${at}`);
    this.name = 'MalformedMethodBodyError';
    this.method = method;
    this.offset = offset;
  }
}

export function formatOffset(offset: number): string {
  return `IL_${offset.toString(16).toUpperCase().padStart(4, '0')}`;
}

/**
 * Number of values an instruction pops from and pushes onto the evaluation stack
 */
export function getStackEffect(ins: Instruction): StackEffect | undefined {
  const { operand } = ins;

  switch (ins.opcode) {
    case 'invoke-direct':
    case 'invoke-virtual':
      if (operand.kind !== 'method') return undefined;
      return {
        pop: operand.method.parameters.length + ((operand.method.hasThis ?? true) ? 1 : 0),
        push: operand.method.returnType === VOID ? 0 : 1,
      };

    case 'construct-object':
      if (operand.kind !== 'method') return undefined;
      return { pop: operand.method.parameters.length, push: 1 };

    case 'load-field':
    case 'load-field-address':
      return { pop: 1, push: 1 };

    case 'store-field':
      return { pop: 2, push: 0 };

    case 'load-self':
      return { pop: 0, push: 1 };

    case 'other':
      return ins.stack;
  }
}

/**
 * Checks the invariants the tracer relies on. Throws MalformedMethodBodyError
 * on the first violation.
 */
export function validateBody(method: Method): void {
  const name = `${method.declaringType}::${method.name}`;
  const offsets = new Set<number>();
  let previous = -1;

  for (const ins of method.instructions) {
    if (!Number.isInteger(ins.offset) || ins.offset <= previous) {
      throw new MalformedMethodBodyError(name, 'offsets are not strictly increasing', ins.offset);
    }
    previous = ins.offset;
    offsets.add(ins.offset);

    const expected = expectedOperandKind(ins);
    if (expected !== undefined && ins.operand.kind !== expected) {
      throw new MalformedMethodBodyError(
        name,
        `${ins.opcode} expects a ${expected} operand, got ${ins.operand.kind}`,
        ins.offset
      );
    }

    const effect = getStackEffect(ins);
    if (!effect || effect.pop < 0 || effect.push < 0) {
      throw new MalformedMethodBodyError(name, 'missing stack effect', ins.offset);
    }
  }

  for (const ins of method.instructions) {
    if (ins.operand.kind !== 'branch') continue;
    for (const target of ins.operand.targets) {
      if (!offsets.has(target)) {
        throw new MalformedMethodBodyError(
          name,
          `branch to ${formatOffset(target)} does not land on an instruction`,
          ins.offset
        );
      }
    }
  }
}

function expectedOperandKind(ins: Instruction): 'field' | 'method' | 'none' | undefined {
  switch (ins.opcode) {
    case 'invoke-direct':
    case 'invoke-virtual':
    case 'construct-object':
      return 'method';
    case 'load-field':
    case 'store-field':
    case 'load-field-address':
      return 'field';
    case 'load-self':
      return 'none';
    case 'other':
      return undefined;
  }
}

/**
 * Offsets that some branch in the method jumps to
 */
export function collectBranchTargets(method: Method): Set<number> {
  const targets = new Set<number>();
  for (const ins of method.instructions) {
    if (ins.operand.kind === 'branch') {
      for (const target of ins.operand.targets) {
        targets.add(target);
      }
    }
  }
  return targets;
}
