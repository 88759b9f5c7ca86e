#!/usr/bin/env node
/**
 * Skiff CLI - Evaluate Skiff expressions
 *
 * Usage:
 *   skiff-eval '[1, 2, 3][-1]'
 *   skiff-eval --check 'len(xs)'
 *   skiff-eval --help
 *   skiff-eval --version
 */

import * as fs from 'fs';
import { collectDiagnostics, createValidationEnvironment } from './check/index.js';
import { loadConfig } from './config.js';
import {
  determineExitCode,
  evaluateSource,
  formatError,
  formatOutput,
  parseArgs,
} from './cli-shared.js';
import { parse } from './parser/index.js';
import { createRuntimeContext } from './runtime/index.js';

/**
 * Display help information
 */
function showHelp(): void {
  console.log(`Skiff Expression Evaluator

Usage:
  skiff-eval <expression>          Evaluate a Skiff expression
  skiff-eval --check <expression>  Report undefined names without running
  skiff-eval --help                Show this help message
  skiff-eval --version             Show version information
  skiff-eval -- <expression>       Treat everything after -- as the expression

Settings are read from .skiff.yaml in the working directory.

Examples:
  skiff-eval '[1, 2, 3]'
  skiff-eval '(1,)'
  skiff-eval 'xs = [1]
append(xs, 2)
xs'`);
}

function isVersioned(value: unknown): value is { version: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'version' in value &&
    typeof value.version === 'string'
  );
}

/**
 * Display version information
 */
function showVersion(): void {
  // Read version from package.json
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(
    fs.readFileSync(packageJsonPath, 'utf-8')
  );
  const version = isVersioned(packageJson) ? packageJson.version : 'unknown';
  console.log(`skiff-eval ${version}`);
}

/**
 * Report every validation problem; exit 1 if there are any
 */
function runCheck(expression: string, cwd: string): number {
  const ctx = createRuntimeContext(loadConfig(cwd) ?? {});
  const diagnostics = collectDiagnostics(
    parse(expression),
    createValidationEnvironment(ctx)
  );
  for (const diagnostic of diagnostics) {
    console.error(formatError(diagnostic));
  }
  return diagnostics.length === 0 ? 0 : 1;
}

/**
 * Evaluate the expression and print its value; returns the exit code
 */
async function runEval(expression: string, cwd: string): Promise<number> {
  const result = await evaluateSource(expression, loadConfig(cwd), {
    onLog: (value) => console.log(formatOutput(value)),
  });
  const { code, message } = determineExitCode(result.value);
  console.log(message ?? formatOutput(result.value));
  return code;
}

/**
 * Entry point for skiff-eval binary
 */
async function main(): Promise<void> {
  try {
    const command = parseArgs(process.argv.slice(2));

    if (command.mode === 'help') {
      showHelp();
      return;
    }
    if (command.mode === 'version') {
      showVersion();
      return;
    }

    const code =
      command.mode === 'check'
        ? runCheck(command.expression, process.cwd())
        : await runEval(command.expression, process.cwd());
    process.exit(code);
  } catch (err) {
    console.error(err instanceof Error ? formatError(err) : String(err));
    process.exit(1);
  }
}

void main();
