#!/usr/bin/env node
/**
 * FHIRPath CLI - Evaluate expressions against FHIR resources
 *
 * Usage:
 *   fhirpath-eval 'name.given' --resource patient.json
 *   fhirpath-eval --help
 *   fhirpath-eval --version
 */

import * as fs from 'fs';
import {
  FHIR_VERSIONS,
  JsonResourceAdapter,
  collection,
  createEvaluationContext,
  evaluate,
  formatDebugTree,
  formatValue,
  parse,
  str,
  toDebugTree,
  toItems,
  type FhirPathValue,
  type FhirVersion,
  type InferredType,
} from './index.js';
import {
  VERSION,
  formatError,
  formatOutput,
  readDataFile,
} from './cli-shared.js';

// ============================================================
// ARGUMENTS
// ============================================================

export interface EvalCommand {
  readonly mode: 'eval';
  readonly expression: string;
  readonly resource?: string | undefined;
  readonly context?: string | undefined;
  readonly variablesFile?: string | undefined;
  /** `--var name=value` pairs, in order */
  readonly vars: Readonly<Record<string, string>>;
  readonly fhirVersion?: FhirVersion | undefined;
  readonly strict: boolean;
  readonly trace: boolean;
  readonly output?: string | undefined;
  readonly debugTree: boolean;
  readonly parseDebug: boolean;
  readonly config?: string | undefined;
}

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | EvalCommand
  | { readonly mode: 'help' }
  | { readonly mode: 'version' };

export function isFhirVersion(text: string): text is FhirVersion {
  return FHIR_VERSIONS.some((version) => version === text);
}

/** Options that take a value, by every spelling */
const VALUE_OPTIONS: Readonly<Record<string, string>> = {
  '--resource': 'resource',
  '-r': 'resource',
  '--context': 'context',
  '-c': 'context',
  '--variables': 'variables',
  '-v': 'variables',
  '--var': 'var',
  '--fhir-version': 'fhirVersion',
  '--output': 'output',
  '-o': 'output',
  '--config': 'config',
};

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws Error on unknown options, missing values or a missing expression
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version')) {
    return { mode: 'version' };
  }

  const values = new Map<string, string>();
  const vars: Record<string, string> = {};
  const flags = new Set<string>();
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const option = VALUE_OPTIONS[arg];
    if (option !== undefined) {
      const value = argv[i + 1];
      if (value === undefined) throw new Error(`Missing value for ${arg}`);
      i++;
      if (option === 'var') {
        const eq = value.indexOf('=');
        if (eq <= 0) throw new Error(`Expected name=value after --var`);
        vars[value.slice(0, eq)] = value.slice(eq + 1);
      } else {
        values.set(option, value);
      }
      continue;
    }
    if (
      arg === '--strict' ||
      arg === '--trace' ||
      arg === '--parse-debug-tree' ||
      arg === '--parse-debug'
    ) {
      flags.add(arg);
      continue;
    }
    if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    }
    positional.push(arg);
  }

  const expression = positional[0];
  if (expression === undefined) throw new Error('Missing expression');
  if (positional.length > 1) {
    throw new Error(`Unexpected argument: ${positional[1] ?? ''}`);
  }

  const version = values.get('fhirVersion');
  let fhirVersion: FhirVersion | undefined;
  if (version !== undefined) {
    if (!isFhirVersion(version)) {
      throw new Error(
        `Unknown FHIR version: ${version} (expected ${FHIR_VERSIONS.join(', ')})`
      );
    }
    fhirVersion = version;
  }

  return {
    mode: 'eval',
    expression,
    resource: values.get('resource'),
    context: values.get('context'),
    variablesFile: values.get('variables'),
    vars,
    fhirVersion,
    strict: flags.has('--strict'),
    trace: flags.has('--trace'),
    output: values.get('output'),
    debugTree: flags.has('--parse-debug-tree'),
    parseDebug: flags.has('--parse-debug'),
    config: values.get('config'),
  };
}

// ============================================================
// CONFIGURATION FILE
// ============================================================

export interface CliConfig {
  readonly fhirVersion?: FhirVersion | undefined;
  readonly strict?: boolean | undefined;
  readonly checkOrderedFunctions?: boolean | undefined;
  readonly variables?: Readonly<Record<string, unknown>> | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalBoolean(
  source: Record<string, unknown>,
  key: string
): boolean | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new Error(`config: ${key} must be a boolean`);
  }
  return value;
}

/**
 * Validate a parsed config document.
 * @throws Error naming the first invalid key
 */
export function parseConfig(document: unknown): CliConfig {
  if (document === null || document === undefined) return {};
  if (!isRecord(document)) throw new Error('config: expected a mapping');

  const version = document['fhirVersion'];
  let fhirVersion: FhirVersion | undefined;
  if (version !== undefined) {
    if (typeof version !== 'string' || !isFhirVersion(version)) {
      throw new Error(
        `config: fhirVersion must be one of ${FHIR_VERSIONS.join(', ')}`
      );
    }
    fhirVersion = version;
  }
  const variables = document['variables'];
  let variableMap: Record<string, unknown> | undefined;
  if (variables !== undefined) {
    if (!isRecord(variables)) {
      throw new Error('config: variables must be a mapping');
    }
    variableMap = variables;
  }

  return {
    fhirVersion,
    strict: optionalBoolean(document, 'strict'),
    checkOrderedFunctions: optionalBoolean(document, 'checkOrderedFunctions'),
    variables: variableMap,
  };
}

// ============================================================
// EVALUATION
// ============================================================

export interface EvalResult {
  /** Text written to stdout or the output file */
  readonly output: string;
  /** `label: value` lines, present when tracing was asked for */
  readonly traces: readonly string[];
}

function rootTypeOf(resource: unknown): InferredType | undefined {
  const resourceType = isRecord(resource) ? resource['resourceType'] : undefined;
  return typeof resourceType === 'string'
    ? { namespace: 'FHIR', name: resourceType, collection: false }
    : undefined;
}

/**
 * Run one eval command. Files named by the command are read here; the
 * result is returned rather than printed.
 *
 * @throws Error from file loading, parsing or evaluation
 */
export function runEval(command: EvalCommand): EvalResult {
  const config: CliConfig = command.config
    ? parseConfig(readDataFile(command.config))
    : {};
  const resource =
    command.resource === undefined ? undefined : readDataFile(command.resource);
  const ast = parse(command.expression);

  if (command.debugTree || command.parseDebug) {
    const tree = toDebugTree(ast, { rootType: rootTypeOf(resource) });
    return {
      output: command.debugTree
        ? JSON.stringify(tree, null, 2)
        : formatDebugTree(tree),
      traces: [],
    };
  }

  const fileVariables = command.variablesFile
    ? readDataFile(command.variablesFile)
    : {};
  if (!isRecord(fileVariables)) {
    throw new Error(`${command.variablesFile ?? ''}: expected a mapping`);
  }

  const adapter = new JsonResourceAdapter();
  const variables: Record<string, FhirPathValue> = {};
  for (const [name, value] of Object.entries({
    ...config.variables,
    ...fileVariables,
  })) {
    variables[name] = adapter.toValue(value);
  }
  for (const [name, value] of Object.entries(command.vars)) {
    variables[name] = str(value);
  }

  const ctx = createEvaluationContext({
    resources: resource === undefined ? [] : [resource],
    variables,
    adapter,
    strict: command.strict || (config.strict ?? false),
    fhirVersion: command.fhirVersion ?? config.fhirVersion,
    checkOrderedFunctions: config.checkOrderedFunctions,
    callbacks: { onTrace: () => undefined },
  });

  let value: FhirPathValue;
  if (command.context === undefined) {
    value = evaluate(ast, ctx);
  } else {
    const focus = evaluate(parse(command.context), ctx);
    value = collection(
      toItems(focus).map((item) => evaluate(ast, ctx, item))
    );
  }

  return {
    output: formatOutput(value),
    traces: command.trace
      ? ctx.engine.trace.entries.map(
          (entry) => `${entry.label}: ${formatValue(entry.value)}`
        )
      : [],
  };
}

// ============================================================
// ENTRY POINT
// ============================================================

function showHelp(): void {
  console.log(`FHIRPath Expression Evaluator

Usage:
  fhirpath-eval <expression> [options]

Options:
  -r, --resource <file>     FHIR resource (JSON or YAML)
  -c, --context <expr>      Evaluate once per item of this expression
  -v, --variables <file>    Variables as a JSON or YAML mapping
  --var name=value          String variable (repeatable)
  --fhir-version <version>  R4, R4B or R5 (default R4)
  --strict                  Unknown members are errors
  --trace                   Print trace() output to stderr
  -o, --output <file>       Write the result to a file
  --parse-debug-tree        Print the typed parse tree as JSON
  --parse-debug             Print the typed parse tree as text
  --config <file>           Defaults for the options above
  -h, --help                Show this help message
  --version                 Show version information

Examples:
  fhirpath-eval "name.where(use = 'official').given" -r patient.json
  fhirpath-eval "given.join(' ')" -r patient.json -c name
  fhirpath-eval "'Dr ' + %family" --var family=Chalmers`);
}

/**
 * Entry point for fhirpath-eval binary
 */
export function main(): void {
  try {
    const command = parseArgs(process.argv.slice(2));

    if (command.mode === 'help') {
      showHelp();
      return;
    }
    if (command.mode === 'version') {
      console.log(`fhirpath-eval ${VERSION}`);
      return;
    }

    const result = runEval(command);
    for (const line of result.traces) {
      console.error(line);
    }
    if (command.output) {
      fs.writeFileSync(command.output, `${result.output}\n`);
    } else {
      console.log(result.output);
    }
  } catch (err) {
    console.error(
      formatError(err instanceof Error ? err : new Error(String(err)))
    );
    process.exitCode = 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
