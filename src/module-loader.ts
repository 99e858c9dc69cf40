/**
 * Module Loader - reads decoded module dumps and exposes them to rules
 *
 * A dump is a YAML or JSON description of a module's types, methods and
 * already-decoded instructions. Each file is validated against
 * schema/module.schema.json before it is turned into the analysis model.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { glob } from 'glob';
import * as YAML from 'yaml';
import AjvModule from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import type {
  FlowControl,
  GeneratedCodeMarker,
  Instruction,
  Method,
  MethodRef,
  ModuleDefinition,
  OpcodeTag,
  Operand,
  ResolvedMethod,
  Resolver,
  StackEffect,
  TypeDefinition,
  TypeHierarchy,
} from './types.js';

const ROOT_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');
const SCHEMA_PATH = path.join(ROOT_DIR, 'schema', 'module.schema.json');
const STACK_EFFECTS_PATH = path.join(ROOT_DIR, 'data', 'stack-effects.json');

const VOID = 'System.Void';
const GENERATED_ATTRIBUTES = [
  'System.Runtime.CompilerServices.CompilerGeneratedAttribute',
  'System.CodeDom.Compiler.GeneratedCodeAttribute',
];

/**
 * Raw dump shapes, as validated by the JSON schema
 */
export interface ModuleDump {
  module: string;
  types: TypeDump[];
}

export interface TypeDump {
  name: string;
  baseType?: string;
  interfaces?: string[];
  attributes?: string[];
  methods?: MethodDump[];
}

export interface MethodDump {
  name: string;
  visibility?: 'public' | 'private' | 'family' | 'assembly' | 'famandassem' | 'famorassem';
  static?: boolean;
  kind?: 'method' | 'constructor' | 'finalizer' | 'getter' | 'setter' | 'event-accessor';
  returnType?: string;
  parameters?: Array<{ name?: string; type: string }>;
  attributes?: string[];
  body?: InstructionDump[];
}

export interface InstructionDump {
  offset: number;
  op: string;
  field?: { declaringType: string; name: string; fieldType?: string };
  method?: {
    declaringType: string;
    name: string;
    returnType?: string;
    parameters?: string[];
    hasThis?: boolean;
  };
  targets?: number[];
  pop?: number;
  push?: number;
  flow?: FlowControl;
}

/**
 * Result of loading module dumps
 */
export interface ModuleLoadResult {
  modules: LoadedModules;
  errors: string[];
}

const OPCODE_TAGS: Record<string, OpcodeTag> = {
  call: 'invoke-direct',
  callvirt: 'invoke-virtual',
  ldfld: 'load-field',
  stfld: 'store-field',
  ldflda: 'load-field-address',
  newobj: 'construct-object',
};

const UNCONDITIONAL_BRANCHES = new Set(['br', 'br.s', 'leave', 'leave.s']);
const RETURNS = new Set(['ret', 'endfinally']);
const THROWS = new Set(['throw', 'rethrow']);

let validator: ValidateFunction<ModuleDump> | undefined;
let stackEffects: Map<string, StackEffect> | undefined;

function getValidator(): ValidateFunction<ModuleDump> {
  if (!validator) {
    const schema: unknown = JSON.parse(fs.readFileSync(SCHEMA_PATH, 'utf-8'));
    if (!isSchemaObject(schema)) {
      throw new Error(`Invalid schema at ${SCHEMA_PATH}`);
    }
    // ajv is CommonJS; under ESM its class sits on the default export
    const ajv = new AjvModule.default({ allErrors: true, strict: false });
    validator = ajv.compile<ModuleDump>(schema);
  }
  return validator;
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getStackEffects(): Map<string, StackEffect> {
  if (!stackEffects) {
    const table: unknown = JSON.parse(fs.readFileSync(STACK_EFFECTS_PATH, 'utf-8'));
    stackEffects = new Map();
    if (typeof table === 'object' && table !== null) {
      for (const [mnemonic, effect] of Object.entries(table)) {
        if (Array.isArray(effect) && typeof effect[0] === 'number' && typeof effect[1] === 'number') {
          stackEffects.set(mnemonic, { pop: effect[0], push: effect[1] });
        }
      }
    }
  }
  return stackEffects;
}

/**
 * Loads every dump matched by the given files or glob patterns
 */
export async function loadModules(patterns: string[], cwd: string = process.cwd()): Promise<ModuleLoadResult> {
  const modules: ModuleDefinition[] = [];
  const errors: string[] = [];

  const files = new Set<string>();
  for (const pattern of patterns) {
    const matches = await glob(pattern, { cwd, absolute: true, nodir: true });
    if (matches.length === 0) {
      errors.push(`No module dumps matched ${pattern}`);
    }
    matches.sort().forEach(file => files.add(file));
  }

  const seen = new Map<string, string>();
  for (const filePath of files) {
    try {
      const module = loadModuleFile(filePath);

      const previous = seen.get(module.name);
      if (previous) {
        errors.push(`Duplicate module "${module.name}" found at ${filePath} (first seen in ${previous})`);
        continue;
      }
      seen.set(module.name, filePath);
      modules.push(module);
    } catch (err) {
      errors.push(`Failed to load module ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return { modules: new LoadedModules(modules), errors };
}

/**
 * Loads and validates a single dump file
 */
export function loadModuleFile(filePath: string): ModuleDefinition {
  const content = fs.readFileSync(filePath, 'utf-8');
  const raw: unknown = filePath.endsWith('.json') ? JSON.parse(content) : YAML.parse(content);
  return parseModuleDump(raw, filePath);
}

/**
 * Validates raw dump data and decodes it into the analysis model
 */
export function parseModuleDump(raw: unknown, source: string): ModuleDefinition {
  const validate = getValidator();

  if (!validate(raw)) {
    throw new Error(`Invalid module dump:\n${formatErrors(validate.errors)}`);
  }

  return {
    name: raw.module,
    source,
    types: raw.types.map(decodeType),
  };
}

function formatErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? []).map(err => `  ${err.instancePath || '/'} ${err.message ?? 'is invalid'}`).join('\n');
}

function decodeType(dump: TypeDump): TypeDefinition {
  const attributes = dump.attributes ?? [];
  const generatedType = dump.name.includes('<') || attributes.some(isGeneratedAttribute);

  return {
    name: dump.name,
    baseType: dump.baseType,
    interfaces: dump.interfaces ?? [],
    attributes,
    methods: (dump.methods ?? []).map(method => decodeMethod(dump.name, method, generatedType)),
  };
}

function decodeMethod(declaringType: string, dump: MethodDump, generatedType: boolean): Method {
  const kind = dump.kind ?? (dump.name === '.ctor' || dump.name === '.cctor' ? 'constructor' : 'method');
  const isStatic = dump.static ?? false;
  const returnType = dump.returnType ?? VOID;

  return {
    declaringType,
    name: dump.name,
    signature: {
      returnType,
      parameters: (dump.parameters ?? []).map((p, i) => ({ name: p.name ?? `arg${i + 1}`, type: p.type })),
    },
    flags: {
      isPublic: dump.visibility === 'public',
      isStatic,
      isConstructor: kind === 'constructor',
      isFinalizer: kind === 'finalizer',
      isPropertyGetter: kind === 'getter',
      isEventAddRemoveOrRaise: kind === 'event-accessor',
      isGeneratedCode: generatedType || (dump.attributes ?? []).some(isGeneratedAttribute),
    },
    instructions: (dump.body ?? []).map(ins => decodeInstruction(ins, isStatic, returnType)),
  };
}

// Accepts full or short names, with or without the Attribute suffix
function isGeneratedAttribute(attribute: string): boolean {
  const name = attribute.endsWith('Attribute') ? attribute : `${attribute}Attribute`;
  return GENERATED_ATTRIBUTES.some(full => full === name || full.endsWith(`.${name}`));
}

/**
 * Maps a mnemonic onto the opcode categories the rules distinguish. Explicit
 * pop/push/flow in the dump win over the built-in table.
 */
export function decodeInstruction(dump: InstructionDump, isStatic: boolean, returnType: string): Instruction {
  const op = dump.op.toLowerCase();

  let opcode: OpcodeTag = OPCODE_TAGS[op] ?? 'other';
  if (op === 'ldarg.0' && !isStatic) {
    opcode = 'load-self';
  }

  const operand = decodeOperand(dump);
  const instruction: Instruction = {
    offset: dump.offset,
    opcode,
    operand,
    flow: dump.flow ?? decodeFlow(op, operand),
    mnemonic: dump.op,
  };

  if (opcode === 'other') {
    const stack = decodeStackEffect(dump, op, returnType);
    if (stack) {
      instruction.stack = stack;
    }
  }

  return instruction;
}

function decodeOperand(dump: InstructionDump): Operand {
  if (dump.method) {
    const method: MethodRef = {
      declaringType: dump.method.declaringType,
      name: dump.method.name,
      returnType: dump.method.returnType ?? VOID,
      parameters: dump.method.parameters ?? [],
    };
    // Left unset when omitted; LoadedModules fills it from the callee
    if (dump.method.hasThis !== undefined) {
      method.hasThis = dump.method.hasThis;
    }
    return { kind: 'method', method };
  }

  if (dump.field) {
    return {
      kind: 'field',
      field: {
        declaringType: dump.field.declaringType,
        name: dump.field.name,
        fieldType: dump.field.fieldType ?? 'System.Object',
      },
    };
  }

  if (dump.targets) {
    return { kind: 'branch', targets: dump.targets };
  }

  return { kind: 'none' };
}

function decodeFlow(op: string, operand: Operand): FlowControl {
  if (RETURNS.has(op)) return 'return';
  if (THROWS.has(op)) return 'throw';
  if (UNCONDITIONAL_BRANCHES.has(op)) return 'branch';
  if (operand.kind === 'branch') return 'conditional-branch';
  return 'next';
}

function decodeStackEffect(dump: InstructionDump, op: string, returnType: string): StackEffect | undefined {
  let known: StackEffect | undefined = getStackEffects().get(op);
  if (op === 'ret') {
    known = { pop: returnType === VOID ? 0 : 1, push: 0 };
  } else if (op === 'ldarg.0') {
    known = { pop: 0, push: 1 };
  }

  const pop = dump.pop ?? known?.pop;
  const push = dump.push ?? known?.push;
  if (pop === undefined || push === undefined) {
    // Left unset: body validation reports the method as malformed
    return undefined;
  }
  return { pop, push };
}

/**
 * Loaded modules plus the lookups rules need over them
 */
export class LoadedModules implements TypeHierarchy, Resolver, GeneratedCodeMarker {
  readonly modules: readonly ModuleDefinition[];

  private readonly types = new Map<string, TypeDefinition>();
  private readonly methods = new Map<string, ResolvedMethod>();

  constructor(modules: readonly ModuleDefinition[]) {
    this.modules = modules;

    for (const module of modules) {
      for (const type of module.types) {
        this.types.set(type.name, type);
        for (const method of type.methods) {
          const key = methodKey(type.name, method.name, method.signature.parameters.map(p => p.type));
          this.methods.set(key, {
            declaringType: type.name,
            name: method.name,
            isPublic: method.flags.isPublic,
            isStatic: method.flags.isStatic,
          });
        }
      }
    }

    for (const module of modules) {
      for (const type of module.types) {
        type.methods.forEach(method => this.resolveInstanceArguments(method));
      }
    }
  }

  /**
   * Calls whose dump did not say whether they pass `this` follow the loaded
   * callee; unresolved callees are taken as instance methods.
   */
  private resolveInstanceArguments(method: Method): void {
    for (const ins of method.instructions) {
      const { operand } = ins;
      if (operand.kind === 'method' && operand.method.hasThis === undefined) {
        const callee = this.resolve(operand.method);
        operand.method.hasThis = callee ? !callee.isStatic : true;
      }
    }
  }

  /**
   * Walks declared interfaces and base types transitively. Types that are not
   * loaded contribute nothing.
   */
  implementsInterface(typeName: string, interfaceName: string): boolean {
    const visited = new Set<string>();
    const pending = [typeName];

    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined || visited.has(current)) continue;
      visited.add(current);

      const type = this.types.get(current);
      if (!type) continue;

      if (type.interfaces.includes(interfaceName)) {
        return true;
      }

      pending.push(...type.interfaces);
      if (type.baseType) {
        pending.push(type.baseType);
      }
    }

    return false;
  }

  resolve(ref: MethodRef): ResolvedMethod | undefined {
    return this.methods.get(methodKey(ref.declaringType, ref.name, ref.parameters));
  }

  isGeneratedCode(method: Method): boolean {
    if (method.flags.isGeneratedCode) {
      return true;
    }
    const type = this.types.get(method.declaringType);
    return type !== undefined && (type.name.includes('<') || type.attributes.some(isGeneratedAttribute));
  }

  countMethods(): number {
    return this.modules.reduce(
      (sum, module) => sum + module.types.reduce((n, type) => n + type.methods.length, 0),
      0
    );
  }
}

function methodKey(declaringType: string, name: string, parameters: readonly string[]): string {
  return `${declaringType}::${name}(${parameters.join(',')})`;
}
