/**
 * Dispose Guard Rule
 *
 * Public methods of a disposable type should throw the guard exception once
 * the object has been disposed. A method is flagged when it touches its own
 * instance state (a field of its type, or a non-public instance method of its
 * type, reached through `this`) and neither constructs the guard exception
 * nor calls a helper whose name says it performs the check.
 *
 * Constructors, finalizers, property getters, event accessors, Equals,
 * GetHashCode, ToString, Close and Dispose itself are exempt.
 *
 * The helper-name test (every fragment of `helperNameFragments` appears in
 * the callee name) is a naming heuristic: an unrelated method that happens to
 * match silences the rule, and a guard helper named differently is missed.
 */

import { MethodSignatures, formatMethod } from '../method-signature.js';
import { CALLS_AND_FIELDS, intersects, isCall, isFieldAccess, summarize } from '../opcodes.js';
import { MalformedMethodBodyError, formatOffset, validateBody } from '../instructions.js';
import { isSelfReceiver } from '../tracer.js';
import { createLogger } from '../log.js';
import type { AnalysisContext, Method, MethodRule, RuleResult } from '../types.js';

export interface DisposeGuardOptions {
  /** Interface marking a type as disposable */
  lifecycleInterface: string;
  /** Exception type a disposed object should throw */
  guardException: string;
  /** Name of the disposal method, which is always exempt */
  disposeMethod: string;
  /** Substrings that together identify a guard helper such as CheckDisposed */
  helperNameFragments: string[];
}

export const DEFAULT_DISPOSE_GUARD_OPTIONS: Readonly<DisposeGuardOptions> = {
  lifecycleInterface: 'System.IDisposable',
  guardException: 'System.ObjectDisposedException',
  disposeMethod: 'Dispose',
  helperNameFragments: ['Check', 'Dispose'],
};

/**
 * Signals collected while scanning one method body
 */
interface AnalysisState {
  sawSelfCall: boolean;
  sawSelfField: boolean;
  sawGuardExceptionConstruction: boolean;
  sawGuardHelperCall: boolean;
}

const log = createLogger('dispose-guard');

export class DisposeGuardRule implements MethodRule {
  readonly id = 'use-object-disposed-exception';
  readonly problem = 'A method of a disposable type does not throw the guard exception after disposal.';
  readonly solution = 'Throw the guard exception from public methods once the object has been disposed.';

  private readonly options: Readonly<DisposeGuardOptions>;

  constructor(options: Partial<DisposeGuardOptions> = {}) {
    this.options = { ...DEFAULT_DISPOSE_GUARD_OPTIONS, ...options };
  }

  checkMethod(method: Method, context: AnalysisContext): RuleResult {
    if (method.instructions.length === 0) {
      return 'does-not-apply';
    }

    // Iterator and async state machines do not reflect the user's code
    if (method.flags.isGeneratedCode || context.generatedCode.isGeneratedCode(method)) {
      return 'does-not-apply';
    }

    if (!this.isEligible(method, context)) {
      return 'does-not-apply';
    }

    let state: AnalysisState;
    try {
      validateBody(method);
      state = this.scan(method, context);
    } catch (err) {
      if (err instanceof MalformedMethodBodyError) {
        log.warn(`skipping ${formatMethod(method)}: ${err.message}`);
        return 'skipped';
      }
      throw err;
    }

    const touchesSelf = state.sawSelfCall || state.sawSelfField;
    if (!touchesSelf || state.sawGuardExceptionConstruction || state.sawGuardHelperCall) {
      return 'success';
    }

    context.reporter.report({
      rule: this.id,
      type: method.declaringType,
      method: method.name,
      signature: formatMethod(method),
      severity: 'medium',
      confidence: 'high',
      message: `${method.name} uses instance state but never throws ${this.options.guardException}`,
    });
    return 'failure';
  }

  /**
   * Public, touches calls or fields, declared on a disposable type, and not
   * one of the methods allowed to run after disposal
   */
  isEligible(method: Method, context: AnalysisContext): boolean {
    if (!method.flags.isPublic) {
      return false;
    }

    if (!intersects(summarize(method), CALLS_AND_FIELDS)) {
      return false;
    }

    if (!context.hierarchy.implementsInterface(method.declaringType, this.options.lifecycleInterface)) {
      return false;
    }

    return this.allowedToThrow(method);
  }

  private allowedToThrow(method: Method): boolean {
    const { flags } = method;

    if (flags.isConstructor || flags.isFinalizer || MethodSignatures.Finalize.matches(method)) {
      return false;
    }

    if (flags.isPropertyGetter || flags.isEventAddRemoveOrRaise) {
      return false;
    }

    if (
      MethodSignatures.Equals1.matches(method) ||
      MethodSignatures.GetHashCode.matches(method) ||
      MethodSignatures.ToString.matches(method) ||
      MethodSignatures.Close.matches(method)
    ) {
      return false;
    }

    return method.name !== this.options.disposeMethod;
  }

  private scan(method: Method, context: AnalysisContext): AnalysisState {
    const state: AnalysisState = {
      sawSelfCall: false,
      sawSelfField: false,
      sawGuardExceptionConstruction: false,
      sawGuardHelperCall: false,
    };
    const ownType = method.declaringType;

    log.debug('-----------------------------------------');
    log.debug(formatMethod(method));

    method.instructions.forEach((ins, index) => {
      const { operand } = ins;

      if (isCall(ins.opcode) && operand.kind === 'method') {
        if (!state.sawSelfCall) {
          const callee = context.resolver.resolve(operand.method);
          if (
            callee &&
            !callee.isPublic &&
            !callee.isStatic &&
            callee.declaringType === ownType &&
            isSelfReceiver(method, index)
          ) {
            log.debug(`found non-public this call at ${formatOffset(ins.offset)}`);
            state.sawSelfCall = true;
          }
        }

        if (!state.sawGuardHelperCall && this.isGuardHelperName(operand.method.name)) {
          log.debug(`found dispose check at ${formatOffset(ins.offset)}`);
          state.sawGuardHelperCall = true;
        }
        return;
      }

      if (isFieldAccess(ins.opcode) && operand.kind === 'field') {
        if (!state.sawSelfField && operand.field.declaringType === ownType && isSelfReceiver(method, index)) {
          log.debug(`found field access at ${formatOffset(ins.offset)}`);
          state.sawSelfField = true;
        }
        return;
      }

      if (ins.opcode === 'construct-object' && operand.kind === 'method') {
        if (!state.sawGuardExceptionConstruction && operand.method.declaringType === this.options.guardException) {
          log.debug(`creates exception at ${formatOffset(ins.offset)}`);
          state.sawGuardExceptionConstruction = true;
        }
      }
    });

    return state;
  }

  private isGuardHelperName(name: string): boolean {
    const fragments = this.options.helperNameFragments;
    return fragments.length > 0 && fragments.every(fragment => name.includes(fragment));
  }
}
