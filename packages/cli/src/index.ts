#!/usr/bin/env -S node --import tsx

// CLI entry point
// - `confsmith defaults` prints (or writes) the default config of a schema.
// - `confsmith validate` loads a config, fills in defaults and validates it.
// Both delegate to the Node API of @confsmith/core; errors are rendered
// through its ErrorPresenter and mapped to the error code's exit status.

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  ConfigError,
  ConfsmithError,
  ErrorCode,
  ErrorPresenter,
  dumpConfig,
  dumpDefaultConfig,
  isConfsmithError,
  loadConfig,
  parseConfigText,
  resolveDialect,
  resolveOptions,
  writeDefaultConfig,
} from '@confsmith/core';
import { renderCLIView } from './render.js';
import {
  requireFlag,
  resolveDumpFormat,
  resolveIndent,
  type DefaultsCliOptions,
  type ValidateCliOptions,
} from './flags.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('confsmith')
    .description('Emit and validate configuration files described by a JSON Schema')
    .version('0.1.0')
    .option('--verbose', 'Print effective options and the schema dialect to stderr');

  program
    .command('defaults')
    .description('Print the default config of a schema')
    .option('-s, --schema <file>', 'JSON Schema file (JSON or YAML)')
    .option('-f, --format <format>', 'Output format: json|yaml|yaml-with-comments', 'yaml')
    .option('-o, --out <file>', 'Write to a file instead of stdout')
    .option('--indent <n>', 'Indent step (default: 4 for json, 2 for yaml)')
    .action(async function (this: Command, options: DefaultsCliOptions) {
      const schema = readSchema(requireFlag(options.schema, '--schema <file>'));
      const format = resolveDumpFormat(options.format);
      const indent = resolveIndent(options.indent);

      if (isVerbose(this)) {
        logVerbose(schema, {
          indent: indent ?? (format === 'json' ? 4 : 2),
          includeComments: format === 'yaml-with-comments',
        });
      }

      if (options.out) {
        await writeDefaultConfig(schema, path.resolve(process.cwd(), options.out), format, {
          indent,
        });
        return;
      }
      process.stdout.write(dumpDefaultConfig(schema, format, { indent }));
    });

  program
    .command('validate')
    .description('Fill in defaults for a config file and validate it')
    .option('-s, --schema <file>', 'JSON Schema file (JSON or YAML)')
    .option('-c, --config <file>', 'Config file (YAML or JSON)')
    .option('--print', 'Print the completed config')
    .option('--print-format <format>', 'Format for --print: json|yaml', 'yaml')
    .action(async function (this: Command, options: ValidateCliOptions) {
      const schema = readSchema(requireFlag(options.schema, '--schema <file>'));
      const configFlag = requireFlag(options.config, '--config <file>');

      if (isVerbose(this)) {
        logVerbose(schema, { injectDefaults: true });
      }

      const config = await loadConfig(path.resolve(process.cwd(), configFlag), schema);
      if (options.print) {
        process.stdout.write(dumpConfig(config, resolveDumpFormat(options.printFormat)));
        return;
      }
      process.stdout.write(`${configFlag}: valid\n`);
    });

  return program;
}

function readSchema(file: string): unknown {
  const abs = path.resolve(process.cwd(), file);
  if (!fs.existsSync(abs)) {
    throw new ConfigError({
      message: `Schema file not found: ${abs}`,
      context: { setting: 'schema', file: abs },
    });
  }
  return parseConfigText(fs.readFileSync(abs, 'utf8'), abs);
}

function isVerbose(command: Command): boolean {
  return command.optsWithGlobals<{ verbose?: boolean }>().verbose === true;
}

function logVerbose(schema: unknown, options: Parameters<typeof resolveOptions>[0]): void {
  const resolved = resolveOptions(options);
  process.stderr.write(
    `[confsmith] effective options: ${JSON.stringify(resolved)}\n`
  );
  if (typeof schema === 'object' && schema !== null && !Array.isArray(schema)) {
    process.stderr.write(`[confsmith] dialect: ${resolveDialect(schema)}\n`);
  }
}

function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: ConfsmithError;
  if (isConfsmithError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new (class extends ConfsmithError {})({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
