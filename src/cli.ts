#!/usr/bin/env node
/**
 * CLI entry point for shindan-client
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { ShindanClient } from './client.js';
import type { ClientOptions } from './config.js';
import { segmentsToText } from './extract/segments.js';
import { isShindanError } from './errors.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    return pkg.version ?? 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

export const COMMANDS = ['title', 'description', 'segments', 'html'] as const;

export type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

/** Commands that submit the form and therefore need a display name. */
const SUBMITTING_COMMANDS = new Set<Command>(['segments', 'html']);

export interface CliOptions {
  command: Command;
  id: string;
  name?: string;
  json: boolean;
  withTitle: boolean;
  region?: string;
  output?: string;
  preset?: string;
  timeout?: number;
  proxy?: string;
}

export type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  let json = false;
  let withTitle = false;
  let region: string | undefined;
  let output: string | undefined;
  let preset: string | undefined;
  let timeout: number | undefined;
  let proxy: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--json':
        json = true;
        break;
      case '--with-title':
        withTitle = true;
        break;
      case '-r':
      case '--region':
        if (i + 1 >= args.length) return { kind: 'error', message: '--region requires a value' };
        region = args[++i];
        break;
      case '-o':
      case '--output':
        if (i + 1 >= args.length) return { kind: 'error', message: '--output requires a value' };
        output = args[++i];
        break;
      case '--preset':
        if (i + 1 >= args.length) return { kind: 'error', message: '--preset requires a value' };
        preset = args[++i];
        break;
      case '--timeout': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--timeout requires a value' };
        const v = parseInt(args[++i], 10);
        if (isNaN(v) || v <= 0)
          return { kind: 'error', message: '--timeout must be a positive integer (milliseconds)' };
        timeout = v;
        break;
      }
      case '--proxy':
        if (i + 1 >= args.length) return { kind: 'error', message: '--proxy requires a value' };
        proxy = args[++i];
        break;
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  const [command, id, name] = positional;
  if (command === undefined) {
    return { kind: 'error', message: 'Missing required <command> argument' };
  }
  if (!isCommand(command)) {
    return {
      kind: 'error',
      message: `Unknown command "${command}" (expected one of: ${COMMANDS.join(', ')})`,
    };
  }
  if (id === undefined) {
    return { kind: 'error', message: 'Missing required <id> argument' };
  }
  if (!/^\d+$/.test(id)) {
    return { kind: 'error', message: '<id> must be numeric' };
  }
  if (SUBMITTING_COMMANDS.has(command) && name === undefined) {
    return { kind: 'error', message: `Missing required <name> argument for ${command}` };
  }
  const expected = SUBMITTING_COMMANDS.has(command) ? 3 : 2;
  if (positional.length > expected) {
    warnings.push(`Ignoring extra arguments: ${positional.slice(expected).join(' ')}`);
  }

  return {
    kind: 'ok',
    opts: { command, id, name, json, withTitle, region, output, preset, timeout, proxy },
    warnings,
  };
}

/**
 * Resolve proxy URL from explicit option or environment variables.
 * Priority: explicit > SHINDAN_PROXY > HTTPS_PROXY > HTTP_PROXY
 */
export function resolveProxy(explicit?: string): string | undefined {
  return (
    explicit || process.env.SHINDAN_PROXY || process.env.HTTPS_PROXY || process.env.HTTP_PROXY
  );
}

export function toClientOptions(opts: CliOptions): ClientOptions {
  const region = opts.region ?? process.env.SHINDAN_REGION;
  const proxy = resolveProxy(opts.proxy);
  return {
    ...(region ? { region } : {}),
    ...(opts.preset ? { preset: opts.preset } : {}),
    ...(opts.timeout ? { timeout: opts.timeout } : {}),
    ...(proxy ? { proxy } : {}),
  };
}

function printUsage(): void {
  console.log(`Usage: shindan <command> <id> [name] [options]

Commands:
  title <id>               Print the shindan title
  description <id>         Print the shindan description
  segments <id> <name>     Submit <name> and print the result text
  html <id> <name>         Submit <name> and print a standalone HTML snapshot

Options:
  -r, --region <tag>       Site region: jp, en, cn, kr, th (env: SHINDAN_REGION, default: en)
  --with-title             Include the shindan title in the output
  --json                   JSON output
  -o, --output <path>      Write the output to a file instead of stdout
  --proxy <url>            HTTP/SOCKS proxy URL (env: SHINDAN_PROXY, HTTPS_PROXY, HTTP_PROXY)
  --preset <value>         TLS fingerprint preset (e.g. chrome-143)
  --timeout <ms>           Per-request timeout in milliseconds (default: 3000)
  -v, --version            Show version number
  -h, --help               Show this help message`);
}

function titled(title: string | undefined, body: string): string {
  return title === undefined ? body : `Title: ${title}\n---\n${body}`;
}

/** Run the command and return what should be printed. */
export async function runCommand(client: ShindanClient, opts: CliOptions): Promise<string> {
  const name = opts.name ?? '';

  switch (opts.command) {
    case 'title': {
      const title = await client.getTitle(opts.id);
      return opts.json ? JSON.stringify({ title }, null, 2) : title;
    }
    case 'description': {
      if (opts.withTitle) {
        const result = await client.getTitleWithDescription(opts.id);
        return opts.json
          ? JSON.stringify(result, null, 2)
          : titled(result.title, result.description);
      }
      const description = await client.getDescription(opts.id);
      return opts.json ? JSON.stringify({ description }, null, 2) : description;
    }
    case 'segments': {
      const result = opts.withTitle
        ? await client.getSegmentsWithTitle(opts.id, name)
        : { segments: await client.getSegments(opts.id, name), title: undefined };
      return opts.json
        ? JSON.stringify(result, null, 2)
        : titled(result.title, segmentsToText(result.segments));
    }
    case 'html': {
      const result = opts.withTitle
        ? await client.getHtmlWithTitle(opts.id, name)
        : { html: await client.getHtml(opts.id, name), title: undefined };
      return opts.json ? JSON.stringify(result, null, 2) : result.html;
    }
  }
}

export async function main(rawArgs: string[] = process.argv.slice(2)): Promise<number> {
  const result = parseArgs(rawArgs);

  switch (result.kind) {
    case 'version':
      console.log(`shindan-client ${getVersion()}`);
      return 0;
    case 'help':
      printUsage();
      return 0;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      return 1;
  }

  const { opts, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  try {
    const client = new ShindanClient(toClientOptions(opts));
    const output = await runCommand(client, opts);

    if (opts.output) {
      writeFileSync(resolve(opts.output), output, 'utf-8');
      console.error(`Wrote ${resolve(opts.output)}`);
    } else {
      console.log(output);
    }
    return 0;
  } catch (error) {
    if (isShindanError(error)) {
      console.error(`Error (${error.code}): ${error.message}`);
      return 1;
    }
    throw error;
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then((code) => {
      // httpcloak's native library keeps the event loop alive; exit explicitly.
      process.exit(code);
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
