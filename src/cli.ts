#!/usr/bin/env node
/**
 * CLI entry point for workshop-crawler
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import * as readline from 'readline';
import { closeAllSessions } from './fetch/http-client.js';
import { crawl } from './crawl/crawler.js';
import { normalizeTarget } from './crawl/target.js';
import { renderPageText } from './crawl/page-text.js';
import type { CrawlConfig, CrawlEvent, LlmsTxtProbe, PageEvent } from './crawl/types.js';

const RULE = '='.repeat(80);
const HASH_RULE = '#'.repeat(80);

const URL_PROMPT = 'Enter a starting URL (e.g. http://localhost:8893/): ';
const LLMS_PROMPT = 'Look for llms.txt under this URL? [y/N]: ';

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

export interface CliOptions {
  url?: string;
  /** undefined means "ask" */
  llms?: boolean;
  json: boolean;
  preset?: string;
  timeout?: number;
  proxy?: string;
  userAgent?: string;
  maxLines?: number;
}

type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

function parsePositiveInt(value: string): number | undefined {
  const v = parseInt(value, 10);
  return isNaN(v) || v <= 0 ? undefined : v;
}

export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  const opts: CliOptions = { json: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--llms':
        opts.llms = true;
        break;
      case '--no-llms':
        opts.llms = false;
        break;
      case '--json':
        opts.json = true;
        break;
      case '--preset':
        if (i + 1 >= args.length) return { kind: 'error', message: '--preset requires a value' };
        opts.preset = args[++i];
        break;
      case '--proxy':
        if (i + 1 >= args.length) return { kind: 'error', message: '--proxy requires a value' };
        opts.proxy = args[++i];
        break;
      case '--user-agent':
        if (i + 1 >= args.length)
          return { kind: 'error', message: '--user-agent requires a value' };
        opts.userAgent = args[++i];
        break;
      case '--timeout': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--timeout requires a value' };
        const v = parsePositiveInt(args[++i]);
        if (v === undefined)
          return { kind: 'error', message: '--timeout must be a positive integer (milliseconds)' };
        opts.timeout = v;
        break;
      }
      case '--max-lines': {
        if (i + 1 >= args.length)
          return { kind: 'error', message: '--max-lines requires a value' };
        const v = parsePositiveInt(args[++i]);
        if (v === undefined)
          return { kind: 'error', message: '--max-lines must be a positive integer' };
        opts.maxLines = v;
        break;
      }
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

  if (positional.length > 1) {
    warnings.push(`Ignoring extra arguments: ${positional.slice(1).join(' ')}`);
  }

  return { kind: 'ok', opts: { ...opts, url: positional[0] }, warnings };
}

/** Only an explicit y/yes opts in. */
export function isYes(answer: string): boolean {
  const a = answer.trim().toLowerCase();
  return a === 'y' || a === 'yes';
}

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/**
 * Prompter over a readline interface. Lines are queued as they arrive, so
 * answers piped in one chunk are not lost between questions; once input ends
 * every pending and later question resolves to ''.
 */
export function createConsolePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = readline.createInterface({ input, output });
  const buffered: string[] = [];
  const waiting: Array<(answer: string) => void> = [];
  let ended = false;

  rl.on('line', (line) => {
    const resolve = waiting.shift();
    if (resolve) resolve(line);
    else buffered.push(line);
  });
  rl.on('close', () => {
    ended = true;
    for (const resolve of waiting.splice(0)) resolve('');
  });
  // readline swallows Ctrl+C while a question is open; hand it to the process handler.
  rl.on('SIGINT', () => {
    rl.close();
    process.kill(process.pid, 'SIGINT');
  });

  return {
    ask: (question) => {
      if (ended) {
        output.write(question);
      } else {
        rl.setPrompt(question);
        rl.prompt();
      }
      const line = buffered.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (ended) return Promise.resolve('');
      return new Promise((resolve) => {
        waiting.push(resolve);
      });
    },
    close: () => rl.close(),
  };
}

function printUsage(): void {
  console.log(`Usage: workshop-crawler [url] [options]

Fetches one URL, prints its content and the links found on it.
Without a URL, asks for one interactively.

Options:
  --llms              Probe <origin>/llms.txt before fetching the URL
  --no-llms           Skip the llms.txt probe without asking
  --json              One JSON object per crawl event instead of the text report
  --max-lines <n>     Print at most n lines of the page body
  --timeout <ms>      Request timeout in milliseconds (default: 15000)
  --preset <value>    TLS fingerprint preset (e.g. chrome-143, firefox-133)
  --proxy <url>       HTTP/SOCKS proxy URL (env: WORKSHOP_CRAWLER_PROXY, HTTPS_PROXY, HTTP_PROXY)
  --user-agent <ua>   Override the preset's User-Agent header
  -v, --version       Show version number
  -h, --help          Show this help message

Exit status is 0 when the URL was fetched, 1 when it failed or was invalid.`);
}

function printBanner(): void {
  console.log('Workshop Web Crawler');
  console.log('Press Ctrl+C to stop.\n');
}

function printLlmsTxt(probe: LlmsTxtProbe): void {
  console.log(`[INFO] Checking for llms.txt at ${probe.url}`);
  switch (probe.status) {
    case 'found':
      console.log(HASH_RULE);
      console.log(`[FOUND] llms.txt at ${probe.url} (${probe.bytes} bytes)`);
      console.log(HASH_RULE);
      console.log(probe.content ?? '');
      console.log(HASH_RULE);
      break;
    case 'not_text':
      console.log('[INFO] llms.txt not in expected text format, ignoring.');
      break;
    case 'not_found':
      console.log(`[INFO] No accessible llms.txt found (${probe.reason ?? 'unknown error'})`);
      break;
  }
}

function printPage(event: PageEvent, maxLines: number | undefined): void {
  const { result } = event;

  if (!result.success) {
    console.error(`[ERROR] Failed to fetch ${result.url}: ${result.errorMessage ?? result.error}`);
    return;
  }

  if (!event.crawlable) {
    console.log(`[SKIP] ${result.url} (Content-Type: ${result.contentType})`);
    return;
  }

  console.log(`[INFO] Fetched ${result.url} (${result.bytes} bytes, ${result.contentType})`);
  console.log(RULE);
  console.log(`[VISITING] ${result.url}`);
  console.log(RULE);
  for (const line of renderPageText(result.body, maxLines)) {
    console.log(line);
  }
  console.log('[END OF PAGE]');

  console.log(`[INFO] Found ${result.links.length} links on ${result.url}`);
  for (const link of result.links) {
    console.log(`  - ${link}`);
  }
}

export function printEvent(event: CrawlEvent, opts: Pick<CliOptions, 'json' | 'maxLines'>): void {
  if (opts.json) {
    console.log(JSON.stringify(event));
    return;
  }

  switch (event.type) {
    case 'llms_txt':
      printLlmsTxt(event.probe);
      break;
    case 'page':
      printPage(event, opts.maxLines);
      break;
    case 'summary': {
      const llms = event.llmsTxtFound ? ', llms.txt found' : '';
      console.error(`\nCrawl complete: ${event.pagesFetched}/1 pages${llms}, ${event.durationMs}ms`);
      break;
    }
  }
}

export interface MainDeps {
  prompter?: Prompter;
  /** Whether questions may be asked when a URL was given on the command line. */
  interactive?: boolean;
}

/**
 * Fill in whatever the flags left open by asking the operator.
 * Returns null when no URL was entered.
 */
async function readRunInputs(
  opts: CliOptions,
  deps: MainDeps
): Promise<{ rawUrl: string; probeLlmsTxt: boolean } | null> {
  const interactive = deps.interactive ?? Boolean(process.stdin.isTTY);
  const needsPrompt = opts.url === undefined || (opts.llms === undefined && interactive);
  const prompter = needsPrompt ? (deps.prompter ?? createConsolePrompter()) : undefined;

  try {
    const rawUrl = opts.url ?? (prompter ? await prompter.ask(URL_PROMPT) : '');
    if (!rawUrl.trim()) return null;
    const probeLlmsTxt =
      opts.llms ?? (prompter ? isYes(await prompter.ask(LLMS_PROMPT)) : false);
    return { rawUrl, probeLlmsTxt };
  } finally {
    prompter?.close();
  }
}

/**
 * Run the CLI once and return the process exit code.
 */
export async function main(
  args: string[] = process.argv.slice(2),
  deps: MainDeps = {}
): Promise<number> {
  const parsed = parseArgs(args);

  switch (parsed.kind) {
    case 'version':
      console.log(`workshop-crawler ${getVersion()}`);
      return 0;
    case 'help':
      printUsage();
      return 0;
    case 'error':
      console.error(`Error: ${parsed.message}`);
      printUsage();
      return 2;
  }

  const { opts, warnings } = parsed;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  if (!opts.json) printBanner();

  const inputs = await readRunInputs(opts, deps);
  if (!inputs) {
    console.log('No URL provided, exiting.');
    return 0;
  }

  const target = normalizeTarget(inputs.rawUrl);
  if (!target.ok) {
    console.error(`[ERROR] Invalid URL: ${target.reason}`);
    return 1;
  }

  const config: CrawlConfig = {
    probeLlmsTxt: inputs.probeLlmsTxt,
    preset: opts.preset,
    timeout: opts.timeout,
    proxy: opts.proxy,
    userAgent: opts.userAgent,
  };

  let success = false;
  try {
    for await (const event of crawl(target.url, config)) {
      printEvent(event, opts);
      if (event.type === 'summary') success = event.success;
    }
  } finally {
    await closeAllSessions();
  }

  return success ? 0 : 1;
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  process.once('SIGINT', () => {
    console.log('\n[INFO] Stopped by user.');
    process.exit(130);
  });
  main()
    .then((code) => {
      // httpcloak's native library keeps libuv handles open; exit explicitly.
      process.exit(code);
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
