/**
 * Receiver Tracer
 *
 * Walks backward from an instruction that consumes a receiver (a call or a
 * field access) to the instruction that pushed it, following the stack
 * discipline of the straight-line code before it. The walk is local to the
 * method and never merges paths: whenever the producer is ambiguous it gives
 * up, so callers only ever see a producer that is certain.
 */

import { collectBranchTargets, getStackEffect } from './instructions.js';
import type { Instruction, Method } from './types.js';

const branchTargetCache = new WeakMap<Method, Set<number>>();

function branchTargets(method: Method): Set<number> {
  let targets = branchTargetCache.get(method);
  if (!targets) {
    targets = collectBranchTargets(method);
    branchTargetCache.set(method, targets);
  }
  return targets;
}

/**
 * Finds the instruction that pushed the deepest operand consumed by the
 * instruction at `index`, which for calls and field accesses is the receiver.
 *
 * Returns undefined when the walk reaches a merge point, crosses an
 * instruction that does not fall through, or runs off the start of the body.
 */
export function traceBack(method: Method, index: number): Instruction | undefined {
  const instructions = method.instructions;
  const consumer = instructions[index];
  if (!consumer) {
    return undefined;
  }

  const effect = getStackEffect(consumer);
  if (!effect || effect.pop === 0) {
    return undefined;
  }

  const targets = branchTargets(method);
  let pending = effect.pop;

  for (let i = index - 1; i >= 0; i--) {
    // The stack on entry to a branch target depends on which path got there
    if (targets.has(instructions[i + 1].offset)) {
      return undefined;
    }

    const producer = instructions[i];
    if (producer.flow === 'branch' || producer.flow === 'return' || producer.flow === 'throw') {
      return undefined;
    }

    const produced = getStackEffect(producer);
    if (!produced) {
      return undefined;
    }

    pending -= produced.push;
    if (pending === 0) {
      return producer;
    }
    if (pending < 0) {
      return undefined;
    }
    pending += produced.pop;
  }

  return undefined;
}

/**
 * True iff the receiver of the instruction at `index` is provably the
 * method's own instance.
 */
export function isSelfReceiver(method: Method, index: number): boolean {
  if (method.flags.isStatic) {
    return false;
  }

  const producer = traceBack(method, index);
  return producer !== undefined && producer.opcode === 'load-self';
}
