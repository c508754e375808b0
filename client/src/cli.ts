#!/usr/bin/env node
/**
 * Command-line front end for a job service
 */

import fs from 'fs';
import path from 'path';
import { once } from 'events';
import { Command, CommanderError, Option } from 'commander';
import prompts from 'prompts';
import { logger } from '@genkit-ai/core/logging';
import { CLIENT_VERSION, JobServiceClient } from './client';
import { clientConfig } from './config';
import { JobServiceError, HTTPStatusError } from './errors';
import { toPath } from './file';
import type { Service } from './service';
import type { Parameter } from './types';

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  /** Ask a yes/no question; false when there is no answer. */
  confirm(question: string): Promise<boolean>;
}

export interface CliDependencies {
  createClient(url: string): JobServiceClient;
  io: CliIo;
}

const defaultDependencies: CliDependencies = {
  createClient: url => new JobServiceClient(url),
  io: {
    out: line => process.stdout.write(`${line}\n`),
    err: line => process.stderr.write(`${line}\n`),
    confirm: async question => {
      const response = await prompts({ type: 'confirm', name: 'answer', message: question, initial: false });
      return response.answer === true;
    },
  },
};

/** Exit status shared between the actions of one run. */
export interface CliOutcome {
  exitCode: number;
}

function isSystemError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'syscall' in error;
}

/**
 * Open every local file up front so a missing one fails before anything is sent.
 */
async function openInputs(files: Record<string, string[]>): Promise<{
  streams: Record<string, fs.ReadStream[]>;
  close(): void;
}> {
  const opened: fs.ReadStream[] = [];
  const close = (): void => opened.forEach(stream => stream.destroy());
  const streams: Record<string, fs.ReadStream[]> = {};
  try {
    for (const [key, paths] of Object.entries(files)) {
      streams[key] = [];
      for (const file of paths) {
        const stream = fs.createReadStream(file);
        opened.push(stream);
        await once(stream, 'ready');
        streams[key].push(stream);
      }
    }
  } catch (error) {
    close();
    throw error;
  }
  return { streams, close };
}

/** Destination of a result file, or undefined when its path leaves `directory`. */
function downloadPath(directory: string, filePath: string): string | undefined {
  const root = path.resolve(directory);
  const destination = path.resolve(root, filePath);
  const relative = path.relative(root, destination);
  if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return undefined;
  }
  return destination;
}

export function describeParameter(parameter: Parameter): string {
  const attributes: string[] = [`name=${parameter.name}`, `required=${parameter.required}`];
  if (parameter.array) {
    attributes.push('array=true');
  }
  if (parameter.default !== undefined) {
    attributes.push(`default=${JSON.stringify(parameter.default)}`);
  }
  switch (parameter.type) {
    case 'integer':
    case 'decimal':
      if (parameter.min !== undefined) attributes.push(`min=${parameter.min}`);
      if (parameter.max !== undefined) attributes.push(`max=${parameter.max}`);
      break;
    case 'text':
      if (parameter.minLength !== undefined) attributes.push(`min-length=${parameter.minLength}`);
      if (parameter.maxLength !== undefined) attributes.push(`max-length=${parameter.maxLength}`);
      break;
    case 'choice':
      attributes.push(`choices=${parameter.choices.join('|')}`);
      break;
    case 'file':
      if (parameter.mediaType) attributes.push(`media-type=${parameter.mediaType}`);
      break;
  }
  const type = parameter.type === 'unknown' ? parameter.rawType : parameter.type;
  return `${parameter.id}: ${type}; ${attributes.join(', ')}`;
}

function printService(io: CliIo, service: Service, terse: boolean): void {
  if (terse) {
    io.out(service.id);
    return;
  }
  io.out(`${service.id}: ${service.name}`);
  io.out('classifiers:');
  for (const classifier of service.classifiers) {
    io.out(` - ${classifier}`);
  }
  io.out('parameters:');
  for (const parameter of service.parameters) {
    io.out(` - ${describeParameter(parameter)}`);
  }
}

/**
 * Split KEY=VALUE arguments; values starting with "@" name local files.
 */
export function parseAssignments(values: readonly string[]): {
  data: Record<string, string[]>;
  files: Record<string, string[]>;
} {
  const data: Record<string, string[]> = {};
  const files: Record<string, string[]> = {};
  for (const assignment of values) {
    const separator = assignment.indexOf('=');
    if (separator <= 0) {
      throw new CommanderError(1, 'job-service.invalidArgument', `Expected KEY=VALUE, got "${assignment}"`);
    }
    const key = assignment.slice(0, separator);
    const value = assignment.slice(separator + 1);
    if (value.startsWith('@')) {
      (files[key] ??= []).push(value.slice(1));
    } else {
      (data[key] ??= []).push(value);
    }
  }
  return { data, files };
}

export function createProgram(
  deps: CliDependencies = defaultDependencies,
  outcome: CliOutcome = { exitCode: 0 }
): Command {
  const { io } = deps;
  const program = new Command();
  const client = (): JobServiceClient => deps.createClient(program.opts<{ url: string }>().url);

  program
    .name('job-service')
    .description('List services, submit jobs and fetch their results')
    .version(CLIENT_VERSION)
    .option('--url <url>', 'job service base URL', clientConfig.baseUrl)
    .exitOverride()
    .configureOutput({
      writeOut: text => io.out(text.trimEnd()),
      writeErr: text => io.err(text.trimEnd()),
    });

  program
    .command('services')
    .description('show available services')
    .option('--name <id>', 'show one service by id')
    .option('--terse', 'print service ids only')
    .action(async (options: { name?: string; terse?: boolean }) => {
      const services = options.name ? [await client().getService(options.name)] : await client().services();
      for (const service of services) {
        printService(io, service, options.terse ?? false);
      }
    });

  program
    .command('submit')
    .description('submit a job; prefix a value with @ to send a local file')
    .argument('<service>', 'service id')
    .argument('[values...]', 'parameter values as KEY=VALUE')
    .option('--terse', 'print the job id only')
    .action(async (serviceId: string, values: string[], options: { terse?: boolean }) => {
      const { data, files } = parseAssignments(values);
      const inputs = await openInputs(files);
      try {
        const job = await client().submitJob(serviceId, data, inputs.streams);
        io.out(options.terse ? job.id : `Job ${job.id} submitted successfully.`);
      } finally {
        inputs.close();
      }
    });

  program
    .command('status')
    .description('show the status of a job')
    .argument('<job-id>', 'job id')
    .option('--terse', 'print the status only')
    .action(async (jobId: string, options: { terse?: boolean }) => {
      const status = await (await client().getJob(jobId)).getStatus();
      io.out(options.terse ? status : `The job status is: ${status}`);
    });

  program
    .command('files')
    .description('list the result files of a job')
    .argument('<job-id>', 'job id')
    .option('--download', 'download the files', false)
    .option('--directory <dir>', 'download directory', process.cwd())
    .addOption(
      new Option('--overwrite <mode>', 'overwrite existing files')
        .choices(['yes', 'no', 'prompt'])
        .default('prompt')
    )
    .action(async (jobId: string, options: { download: boolean; directory: string; overwrite: string }) => {
      const job = await client().getJob(jobId);
      for (const file of await job.getResults()) {
        io.out(`${file.id}: ${file.label}; content-type=${file.mediaType}`);
        if (!options.download) {
          continue;
        }
        const destination = downloadPath(options.directory, file.path);
        if (!destination) {
          io.err(`error: Path "${file.path}" of ${file.id} is outside ${options.directory}. Skipping.`);
          outcome.exitCode = 1;
          continue;
        }
        if (fs.existsSync(destination)) {
          if (options.overwrite === 'no') {
            io.out(`File ${destination} exists. Skipping.`);
            continue;
          }
          if (options.overwrite === 'prompt' && !(await io.confirm(`File ${destination} exists. Overwrite?`))) {
            io.out('Skipping.');
            continue;
          }
        }
        await fs.promises.mkdir(path.dirname(destination), { recursive: true });
        await file.dump(toPath(destination));
      }
    });

  return program;
}

/**
 * Run the CLI and return the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = defaultDependencies): Promise<number> {
  const outcome: CliOutcome = { exitCode: 0 };
  try {
    await createProgram(deps, outcome).parseAsync([...argv]);
    return outcome.exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version end up here too, with exit code 0
      if (error.code === 'job-service.invalidArgument') {
        deps.io.err(`error: ${error.message}`);
      }
      return error.exitCode;
    }
    if (error instanceof JobServiceError) {
      deps.io.err(`error: ${error.message}`);
      if (error instanceof HTTPStatusError && error.hint) {
        deps.io.err(`hint: ${error.hint}`);
      }
      return 1;
    }
    // local files that cannot be read or written
    if (isSystemError(error)) {
      deps.io.err(`error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  logger.setLogLevel(clientConfig.logLevel);
  runCli(process.argv).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error(`Unexpected failure: ${error instanceof Error ? error.stack : String(error)}`);
      process.exitCode = 1;
    }
  );
}
