/**
 * Receiver tracer tests
 */

import { describe, it, expect } from 'vitest';
import { traceBack, isSelfReceiver } from '../src/tracer.js';
import { call, ldfld, makeMethod, other, ret, self, stfld } from './helpers/builders.js';

const TYPE = 'Acme.IO.WriteStuff';

describe('traceBack', () => {
  it('finds the receiver of a field load', () => {
    const method = makeMethod({
      declaringType: TYPE,
      name: 'Write',
      instructions: [self(0), ldfld(1, TYPE, 'writer'), other(6, 'pop', 1, 0), ret(7)],
    });

    expect(traceBack(method, 1)).toBe(method.instructions[0]);
    expect(isSelfReceiver(method, 1)).toBe(true);
  });

  it('skips the stored value to reach the receiver of a field store', () => {
    const method = makeMethod({
      declaringType: TYPE,
      name: 'Set',
      instructions: [self(0), other(1, 'ldarg.1', 0, 1), stfld(2, TYPE, 'writer'), ret(7)],
    });

    expect(traceBack(method, 2)?.offset).toBe(0);
    expect(isSelfReceiver(method, 2)).toBe(true);
  });

  it('skips over nested expressions that produce the value operand', () => {
    // this.copy = this.writer
    const method = makeMethod({
      declaringType: TYPE,
      name: 'Copy',
      instructions: [self(0), self(1), ldfld(2, TYPE, 'writer'), stfld(7, TYPE, 'copy'), ret(12)],
    });

    expect(traceBack(method, 3)?.offset).toBe(0);
  });

  it('reports the field load, not self, as the receiver of a call on a field', () => {
    // this.writer.Write(message)
    const method = makeMethod({
      declaringType: TYPE,
      name: 'Write',
      instructions: [
        self(0),
        ldfld(1, TYPE, 'writer'),
        other(6, 'ldarg.1', 0, 1),
        call(7, { declaringType: 'System.IO.TextWriter', name: 'Write', parameters: ['System.String'] }, true),
        ret(12),
      ],
    });

    expect(traceBack(method, 3)?.offset).toBe(1);
    expect(isSelfReceiver(method, 3)).toBe(false);
    expect(isSelfReceiver(method, 1)).toBe(true);
  });

  it('does not treat another argument as self', () => {
    const method = makeMethod({
      declaringType: TYPE,
      name: 'CopyFrom',
      instructions: [other(0, 'ldarg.1', 0, 1), ldfld(1, TYPE, 'writer'), other(6, 'pop', 1, 0), ret(7)],
    });

    expect(traceBack(method, 1)?.mnemonic).toBe('ldarg.1');
    expect(isSelfReceiver(method, 1)).toBe(false);
  });

  it('gives up when the consumer is a branch target', () => {
    const method = makeMethod({
      declaringType: TYPE,
      name: 'Merge',
      instructions: [
        self(0),
        other(1, 'ldarg.1', 0, 1),
        other(2, 'brfalse.s', 1, 0, 'conditional-branch', [4]),
        other(3, 'nop', 0, 0),
        ldfld(4, TYPE, 'writer'),
        other(9, 'pop', 1, 0),
        ret(10),
      ],
    });

    expect(traceBack(method, 4)).toBeUndefined();
    expect(isSelfReceiver(method, 4)).toBe(false);
  });

  it('gives up when it would step past a merge point', () => {
    const method = makeMethod({
      declaringType: TYPE,
      name: 'Merge',
      instructions: [
        self(0),
        other(1, 'ldarg.1', 0, 1),
        other(2, 'brfalse.s', 1, 0, 'conditional-branch', [3]),
        other(3, 'nop', 0, 0),
        ldfld(4, TYPE, 'writer'),
        other(9, 'pop', 1, 0),
        ret(10),
      ],
    });

    expect(traceBack(method, 4)).toBeUndefined();
  });

  it('walks back over a conditional branch that does not target the path', () => {
    const method = makeMethod({
      declaringType: TYPE,
      name: 'Guarded',
      instructions: [
        other(0, 'ldarg.1', 0, 1),
        other(1, 'brfalse.s', 1, 0, 'conditional-branch', [9]),
        self(3),
        ldfld(4, TYPE, 'writer'),
        other(9, 'pop', 1, 0),
        ret(10),
      ],
    });

    expect(traceBack(method, 3)?.offset).toBe(3);
  });

  it('gives up across an instruction that does not fall through', () => {
    const method = makeMethod({
      declaringType: TYPE,
      name: 'Dead',
      instructions: [self(0), ret(1), ldfld(2, TYPE, 'writer'), other(7, 'pop', 1, 0), ret(8)],
    });

    expect(traceBack(method, 2)).toBeUndefined();
  });

  it('gives up when a producer pushes more than is pending', () => {
    const method = makeMethod({
      declaringType: TYPE,
      name: 'Dup',
      instructions: [self(0), other(1, 'dup', 1, 2), ldfld(2, TYPE, 'writer'), other(7, 'pop', 1, 0), ret(8)],
    });

    expect(traceBack(method, 2)).toBeUndefined();
  });

  it('gives up at the start of the method', () => {
    const method = makeMethod({
      declaringType: TYPE,
      name: 'Broken',
      instructions: [ldfld(0, TYPE, 'writer'), ret(5)],
    });

    expect(traceBack(method, 0)).toBeUndefined();
  });

  it('returns undefined for consumers that pop nothing', () => {
    const method = makeMethod({
      declaringType: TYPE,
      name: 'Nothing',
      instructions: [self(0), call(1, { declaringType: TYPE, name: 'Static', hasThis: false }), ret(6)],
    });

    expect(traceBack(method, 1)).toBeUndefined();
  });

  it('never reports self in a static method', () => {
    const method = makeMethod({
      declaringType: TYPE,
      name: 'Create',
      flags: { isStatic: true },
      instructions: [self(0), ldfld(1, TYPE, 'writer'), other(6, 'pop', 1, 0), ret(7)],
    });

    expect(traceBack(method, 1)?.offset).toBe(0);
    expect(isSelfReceiver(method, 1)).toBe(false);
  });
});
