/**
 * Method signatures - match methods by name, return type and parameters
 */

import type { Method } from './types.js';

export interface MethodSignatureOptions {
  name: string;
  returnType?: string;
  /**
   * Parameter types. An entry of `undefined` matches any type; omit the
   * array entirely to accept any parameter list.
   */
  parameters?: ReadonlyArray<string | undefined>;
}

export class MethodSignature {
  readonly name: string;
  readonly returnType?: string;
  readonly parameters?: ReadonlyArray<string | undefined>;

  constructor(options: MethodSignatureOptions) {
    this.name = options.name;
    this.returnType = options.returnType;
    this.parameters = options.parameters;
  }

  matches(method: Method): boolean {
    if (method.name !== this.name) {
      return false;
    }

    if (this.returnType !== undefined && method.signature.returnType !== this.returnType) {
      return false;
    }

    if (this.parameters === undefined) {
      return true;
    }

    const actual = method.signature.parameters;
    if (actual.length !== this.parameters.length) {
      return false;
    }

    return this.parameters.every((expected, i) => expected === undefined || expected === actual[i].type);
  }
}

export const MethodSignatures = {
  Finalize: new MethodSignature({ name: 'Finalize', returnType: 'System.Void', parameters: [] }),
  GetHashCode: new MethodSignature({ name: 'GetHashCode', returnType: 'System.Int32', parameters: [] }),
  ToString: new MethodSignature({ name: 'ToString', returnType: 'System.String', parameters: [] }),
  Equals1: new MethodSignature({ name: 'Equals', returnType: 'System.Boolean', parameters: [undefined] }),
  Close: new MethodSignature({ name: 'Close', returnType: 'System.Void', parameters: [] }),
} as const;

/**
 * Display form used in findings, e.g. `System.Void Ns.Type::Write(System.String)`
 */
export function formatMethod(method: Method): string {
  const params = method.signature.parameters.map(p => p.type).join(',');
  return `${method.signature.returnType} ${method.declaringType}::${method.name}(${params})`;
}
