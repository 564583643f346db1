/**
 * FHIRPath CLI Tests: fhirpath-eval command
 */

import { describe, expect, it, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  parseArgs,
  parseConfig,
  runEval,
  type EvalCommand,
} from '../../src/cli-eval.js';
import { EvaluationError } from '../../src/index.js';
import { PATIENT } from '../helpers/runtime.js';

function command(
  expression: string,
  options: Partial<Omit<EvalCommand, 'mode' | 'expression'>> = {}
): EvalCommand {
  return {
    mode: 'eval',
    expression,
    vars: {},
    strict: false,
    trace: false,
    debugTree: false,
    parseDebug: false,
    ...options,
  };
}

describe('fhirpath-eval', () => {
  describe('parseArgs', () => {
    it('parses an expression with a resource', () => {
      expect(parseArgs(['name.given', '-r', 'patient.json'])).toEqual({
        mode: 'eval',
        expression: 'name.given',
        resource: 'patient.json',
        context: undefined,
        variablesFile: undefined,
        vars: {},
        fhirVersion: undefined,
        strict: false,
        trace: false,
        output: undefined,
        debugTree: false,
        parseDebug: false,
        config: undefined,
      });
    });

    it('parses long options and flags', () => {
      const parsed = parseArgs([
        '--context',
        'name',
        '--variables',
        'vars.yaml',
        '--fhir-version',
        'R5',
        '--strict',
        '--trace',
        '--output',
        'out.json',
        '--config',
        'cli.yaml',
        'given',
      ]);
      expect(parsed).toMatchObject({
        mode: 'eval',
        expression: 'given',
        context: 'name',
        variablesFile: 'vars.yaml',
        fhirVersion: 'R5',
        strict: true,
        trace: true,
        output: 'out.json',
        config: 'cli.yaml',
      });
    });

    it('collects --var pairs, splitting at the first =', () => {
      const parsed = parseArgs(['%a', '--var', 'a=1', '--var', 'b=x=y']);
      expect(parsed).toMatchObject({ vars: { a: '1', b: 'x=y' } });
    });

    it('parses the debug tree flags', () => {
      expect(parseArgs(['1', '--parse-debug-tree'])).toMatchObject({
        debugTree: true,
        parseDebug: false,
      });
      expect(parseArgs(['1', '--parse-debug'])).toMatchObject({
        debugTree: false,
        parseDebug: true,
      });
    });

    it('parses help and version flags', () => {
      expect(parseArgs(['--help']).mode).toBe('help');
      expect(parseArgs(['-h']).mode).toBe('help');
      expect(parseArgs(['--version']).mode).toBe('version');
    });

    it('throws on malformed arguments', () => {
      expect(() => parseArgs(['x', '-r'])).toThrow('Missing value for -r');
      expect(() => parseArgs(['x', '--var', '=1'])).toThrow(
        'Expected name=value after --var'
      );
      expect(() => parseArgs(['x', '--bogus'])).toThrow(
        'Unknown option: --bogus'
      );
      expect(() => parseArgs([])).toThrow('Missing expression');
      expect(() => parseArgs(['a', 'b'])).toThrow('Unexpected argument: b');
    });

    it('rejects an unknown FHIR version', () => {
      expect(() => parseArgs(['x', '--fhir-version', 'R3'])).toThrow(
        'Unknown FHIR version: R3 (expected R4, R4B, R5)'
      );
    });
  });

  describe('parseConfig', () => {
    it('accepts an empty document', () => {
      expect(parseConfig(null)).toEqual({});
    });

    it('reads every key', () => {
      expect(
        parseConfig({
          fhirVersion: 'R4B',
          strict: true,
          checkOrderedFunctions: false,
          variables: { limit: 5 },
        })
      ).toEqual({
        fhirVersion: 'R4B',
        strict: true,
        checkOrderedFunctions: false,
        variables: { limit: 5 },
      });
    });

    it('names the first invalid key', () => {
      expect(() => parseConfig(['R4'])).toThrow('config: expected a mapping');
      expect(() => parseConfig({ fhirVersion: 'R6' })).toThrow(
        'config: fhirVersion must be one of R4, R4B, R5'
      );
      expect(() => parseConfig({ strict: 'yes' })).toThrow(
        'config: strict must be a boolean'
      );
      expect(() => parseConfig({ variables: [1] })).toThrow(
        'config: variables must be a mapping'
      );
    });
  });

  describe('runEval', () => {
    let tempDir: string;
    let patientFile: string;

    beforeAll(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fhirpath-eval-test-'));
      patientFile = await writeFile('patient.json', JSON.stringify(PATIENT));
    });

    afterAll(async () => {
      await fs.rm(tempDir, { recursive: true });
    });

    async function writeFile(name: string, content: string): Promise<string> {
      const filePath = path.join(tempDir, name);
      await fs.writeFile(filePath, content);
      return filePath;
    }

    it('evaluates against a resource file', () => {
      const result = runEval(command('name.given', { resource: patientFile }));
      expect(result.output).toBe(
        JSON.stringify(['Peter', 'James', 'Jim'], null, 2)
      );
      expect(result.traces).toEqual([]);
    });

    it('prints Empty as an empty list', () => {
      const result = runEval(command('Patient.foo', { resource: patientFile }));
      expect(result.output).toBe('[]');
    });

    it('reads YAML resources', async () => {
      const file = await writeFile(
        'patient.yaml',
        'resourceType: Patient\nname:\n  - family: Doe\n'
      );
      expect(runEval(command('Patient.name.family', { resource: file })).output).toBe(
        '"Doe"'
      );
    });

    it('evaluates once per context item', () => {
      const result = runEval(
        command("given.join(' ')", { resource: patientFile, context: 'name' })
      );
      expect(result.output).toBe(
        JSON.stringify(['Peter James', 'Jim'], null, 2)
      );
    });

    it('passes --var values as strings', () => {
      const result = runEval(
        command("'Dr ' + %family", { vars: { family: 'Chalmers' } })
      );
      expect(result.output).toBe('"Dr Chalmers"');
    });

    it('reads a variables file', async () => {
      const file = await writeFile('vars.yaml', 'limit: 5\n');
      const result = runEval(command('%limit > 3', { variablesFile: file }));
      expect(result.output).toBe('true');
    });

    it('rejects a variables file that is not a mapping', async () => {
      const file = await writeFile('list.yaml', '- 1\n- 2\n');
      expect(() => runEval(command('1', { variablesFile: file }))).toThrow(
        `${file}: expected a mapping`
      );
    });

    it('applies config defaults', async () => {
      const file = await writeFile('r5.yaml', 'fhirVersion: R5\nstrict: true\n');
      expect(runEval(command('0 and true', { config: file })).output).toBe(
        'true'
      );
      expect(() =>
        runEval(command('Patient.foo', { config: file, resource: patientFile }))
      ).toThrow(EvaluationError);
    });

    it('lets a --fhir-version override the config', async () => {
      const file = await writeFile('r5-only.yaml', 'fhirVersion: R5\n');
      expect(
        runEval(command('0 and true', { config: file, fhirVersion: 'R4' })).output
      ).toBe('false');
    });

    it('collects traces when asked', () => {
      const result = runEval(
        command("name.given.trace('g').count()", {
          resource: patientFile,
          trace: true,
        })
      );
      expect(result.output).toBe('3');
      expect(result.traces).toEqual(["g: ['Peter', 'James', 'Jim']"]);
    });

    it('prints the debug tree as text', () => {
      expect(runEval(command('1 + 2', { parseDebug: true })).output).toBe(
        [
          'BinaryExpression + : System.Integer',
          '  ConstantExpression 1 : System.Integer',
          '  ConstantExpression 2 : System.Integer',
        ].join('\n')
      );
    });

    it('types the tree root from the resource', () => {
      expect(
        runEval(command('name', { parseDebug: true, resource: patientFile }))
          .output
      ).toBe('ChildExpression name\n  AxisExpression builtin.that : FHIR.Patient');
    });

    it('prints the debug tree as JSON', () => {
      const result = runEval(command('%ucum', { debugTree: true }));
      expect(JSON.parse(result.output)).toEqual({
        ExpressionType: 'VariableRefExpression',
        Name: 'ucum',
        ReturnType: 'System.String',
      });
    });

    it('reports a malformed file', async () => {
      const file = await writeFile('broken.yaml', 'a: [1\n');
      expect(() => runEval(command('1', { resource: file }))).toThrow(
        `Cannot parse ${file}: `
      );
    });

    it('reports a missing file', () => {
      const missing = path.join(tempDir, 'missing.json');
      let caught: unknown;
      try {
        runEval(command('1', { resource: missing }));
      } catch (error) {
        caught = error;
      }
      expect(caught).toMatchObject({ code: 'ENOENT', path: missing });
    });
  });
});
