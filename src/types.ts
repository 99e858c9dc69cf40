/**
 * Core type definitions for disposal-guard analysis
 */

/**
 * Opcode categories the analysis distinguishes. Every concrete opcode the
 * decoder does not map to one of the named categories is `other`.
 */
export type OpcodeTag =
  | 'invoke-direct'
  | 'invoke-virtual'
  | 'load-field'
  | 'store-field'
  | 'load-field-address'
  | 'construct-object'
  | 'load-self'
  | 'other';

/**
 * How control leaves an instruction
 */
export type FlowControl = 'next' | 'branch' | 'conditional-branch' | 'return' | 'throw';

export interface FieldRef {
  declaringType: string;
  name: string;
  fieldType: string;
}

export interface MethodRef {
  declaringType: string;
  name: string;
  returnType: string;
  /** Parameter types, in order */
  parameters: readonly string[];
  /**
   * True when the callee takes an implicit instance argument. Unset when the
   * decoder could not tell; an unset callee is treated as an instance method.
   */
  hasThis?: boolean;
}

export type Operand =
  | { kind: 'none' }
  | { kind: 'field'; field: FieldRef }
  | { kind: 'method'; method: MethodRef }
  | { kind: 'branch'; targets: readonly number[] };

export interface StackEffect {
  pop: number;
  push: number;
}

/**
 * A decoded instruction. Immutable once the modules are loaded.
 */
export interface Instruction {
  offset: number;
  opcode: OpcodeTag;
  operand: Operand;
  flow: FlowControl;
  /** Required for `other`; derived from the operand for every other tag */
  stack?: StackEffect;
  /** Raw opcode name, only used in logs */
  mnemonic?: string;
}

export interface Parameter {
  name: string;
  type: string;
}

export interface MethodSignatureInfo {
  returnType: string;
  parameters: readonly Parameter[];
}

export interface MethodFlags {
  isPublic: boolean;
  isStatic: boolean;
  isConstructor: boolean;
  isFinalizer: boolean;
  isPropertyGetter: boolean;
  isEventAddRemoveOrRaise: boolean;
  isGeneratedCode: boolean;
}

export interface Method {
  declaringType: string;
  name: string;
  signature: MethodSignatureInfo;
  flags: Readonly<MethodFlags>;
  instructions: readonly Instruction[];
}

/**
 * The parts of a resolved call target the rule cares about
 */
export interface ResolvedMethod {
  declaringType: string;
  name: string;
  isPublic: boolean;
  isStatic: boolean;
}

export interface TypeHierarchy {
  implementsInterface(typeName: string, interfaceName: string): boolean;
}

export interface Resolver {
  /** Returns undefined when the reference cannot be resolved */
  resolve(ref: MethodRef): ResolvedMethod | undefined;
}

export interface GeneratedCodeMarker {
  isGeneratedCode(method: Method): boolean;
}

export type Severity = 'critical' | 'high' | 'medium' | 'low' | 'audit';

export type Confidence = 'total' | 'high' | 'normal' | 'low';

/**
 * A violation found in a method body
 */
export interface Finding {
  rule: string;
  /** Full name of the declaring type */
  type: string;
  method: string;
  /** Display form, e.g. `System.Void Ns.WriteStuff::Write(System.String)` */
  signature: string;
  severity: Severity;
  confidence: Confidence;
  message: string;
}

/**
 * Sink for findings. Each call carries one complete finding.
 */
export interface Reporter {
  report(finding: Finding): void;
}

export type RuleResult = 'does-not-apply' | 'success' | 'failure' | 'skipped';

/**
 * Everything a rule may consult besides the method itself
 */
export interface AnalysisContext {
  hierarchy: TypeHierarchy;
  resolver: Resolver;
  generatedCode: GeneratedCodeMarker;
  reporter: Reporter;
}

/**
 * A rule inspected once per method by the runner
 */
export interface MethodRule {
  id: string;
  problem: string;
  solution: string;
  checkMethod(method: Method, context: AnalysisContext): RuleResult;
}

/**
 * A type in a loaded module
 */
export interface TypeDefinition {
  name: string;
  baseType?: string;
  interfaces: readonly string[];
  attributes: readonly string[];
  methods: readonly Method[];
}

export interface ModuleDefinition {
  name: string;
  /** File the module dump was read from */
  source: string;
  types: readonly TypeDefinition[];
}

/**
 * Summary statistics for an analysis run
 */
export interface RunStats {
  modulesAnalyzed: number;
  typesAnalyzed: number;
  methodsAnalyzed: number;
  results: Record<RuleResult, number>;
  suppressed: number;
}

/**
 * Audit record produced by a run
 */
export interface AuditRecord {
  tool: string;
  tool_version: string;
  timestamp: string;
  modules_analyzed: string[];
  methods_analyzed: number;
  rules_applied: string[];
  findings: Finding[];
  summary: AuditSummary;
}

export interface AuditSummary {
  total_findings: number;
  by_severity: Record<Severity, number>;
  skipped_methods: number;
  suppressed_findings: number;
  passed: boolean;
}
