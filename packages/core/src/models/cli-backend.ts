// packages/core/src/models/cli-backend.ts — Agentic CLI subprocess backend

import { spawn } from 'node:child_process';
import { z } from 'zod';
import { renderPrompt } from '../agents/prompts.js';
import type {
  AgentBackend,
  AgentRequest,
  BackendCallOptions,
  BackendResult,
} from '../types/agents.js';
import type { AgentsConfig } from '../types/config.js';
import { MAX_OUTPUT_BYTES } from '../utils/constants.js';

const READ_ONLY_TOOLS = 'Read,Glob,Grep,LS';

// Default env vars always passed to CLI subprocesses
const BASE_ENV_ALLOWLIST = [
  'PATH',
  'HOME',
  'TEMP',
  'TMP',
  'USERPROFILE',
  'SystemRoot',
  'COMSPEC',
  'SHELL',
];

// -- stream-json events --

const usageSchema = z
  .object({
    input_tokens: z.number().optional(),
    output_tokens: z.number().optional(),
    cache_creation_input_tokens: z.number().optional(),
    cache_read_input_tokens: z.number().optional(),
  })
  .passthrough();

const contentBlockSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
    name: z.string().optional(),
  })
  .passthrough();

const assistantEventSchema = z
  .object({
    type: z.literal('assistant'),
    message: z
      .object({
        content: z.array(contentBlockSchema).default([]),
      })
      .passthrough(),
  })
  .passthrough();

const resultEventSchema = z
  .object({
    type: z.literal('result'),
    subtype: z.string().optional(),
    is_error: z.boolean().optional(),
    result: z.string().optional(),
    num_turns: z.number().optional(),
    total_cost_usd: z.number().optional(),
    usage: usageSchema.optional(),
  })
  .passthrough();

const streamEventSchema = z.union([assistantEventSchema, resultEventSchema]);

export type StreamEvent = z.infer<typeof streamEventSchema>;

/** Parse one stream-json line. Unknown or malformed lines yield null. */
export function parseStreamLine(line: string): StreamEvent | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    return null;
  }
  const parsed = streamEventSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/** Fold a complete stream-json transcript into a backend result. */
export function parseStreamJson(stdout: string): BackendResult & { sawResult: boolean; isError: boolean } {
  const textParts: string[] = [];
  let turns = 0;
  let result: z.infer<typeof resultEventSchema> | null = null;

  for (const line of stdout.split('\n')) {
    const event = parseStreamLine(line);
    if (!event) continue;
    if (event.type === 'assistant') {
      turns += 1;
      for (const block of event.message.content) {
        if (block.type === 'text' && block.text) textParts.push(block.text);
      }
    } else {
      result = event;
    }
  }

  if (!result) {
    return { text: textParts.join('\n'), turns, sawResult: false, isError: false };
  }
  const usage = result.usage;
  const inputTokens = usage
    ? (usage.input_tokens ?? 0) +
      (usage.cache_creation_input_tokens ?? 0) +
      (usage.cache_read_input_tokens ?? 0)
    : undefined;
  return {
    text: result.result ?? textParts.join('\n'),
    inputTokens,
    outputTokens: usage?.output_tokens,
    costUsd: result.total_cost_usd,
    turns: result.num_turns ?? turns,
    budgetExhausted: result.subtype === 'error_max_turns',
    sawResult: true,
    isError: result.is_error === true && result.subtype !== 'error_max_turns',
  };
}

export class CliBackend implements AgentBackend {
  readonly name: string;
  private command: string;
  private baseArgs: string[];
  private model: string;
  private envAllowlist: string[];

  constructor(config: Pick<AgentsConfig, 'command' | 'args' | 'model' | 'envAllowlist'>) {
    this.command = config.command;
    this.baseArgs = config.args;
    this.model = config.model;
    this.envAllowlist = config.envAllowlist;
    this.name = `cli:${config.command}`;
  }

  buildArgs(request: AgentRequest, systemPrompt: string): string[] {
    return [
      '-p',
      '--output-format',
      'stream-json',
      '--verbose',
      '--max-turns',
      String(request.maxTurns),
      '--model',
      this.model,
      '--allowedTools',
      READ_ONLY_TOOLS,
      '--append-system-prompt',
      systemPrompt,
      ...this.baseArgs,
    ];
  }

  async run(request: AgentRequest, options: BackendCallOptions): Promise<BackendResult> {
    const prompt = renderPrompt(request);
    const env = buildFilteredEnv([...BASE_ENV_ALLOWLIST, ...this.envAllowlist]);
    const stdout = await this.runProcess(
      this.buildArgs(request, prompt.system),
      env,
      request.cwd,
      prompt.user,
      options,
    );
    const parsed = parseStreamJson(stdout);
    if (!parsed.sawResult) {
      throw new Error(`${this.command} produced no result event`);
    }
    if (parsed.isError) {
      throw new Error(`${this.command} reported an error: ${parsed.text.slice(0, 500)}`);
    }
    return {
      text: parsed.text,
      inputTokens: parsed.inputTokens,
      outputTokens: parsed.outputTokens,
      costUsd: parsed.costUsd,
      turns: parsed.turns,
      budgetExhausted: parsed.budgetExhausted,
      model: this.model,
    };
  }

  private runProcess(
    args: string[],
    env: Record<string, string>,
    cwd: string,
    stdinData: string,
    options: BackendCallOptions,
  ): Promise<string> {
    return new Promise((resolve, reject) => {
      if (options.signal.aborted) {
        reject(new Error('Aborted before spawn'));
        return;
      }

      const child = spawn(this.command, args, {
        cwd,
        env,
        stdio: ['pipe', 'pipe', 'pipe'],
        windowsHide: true,
        detached: process.platform !== 'win32',
        shell: process.platform === 'win32',
      });

      let stdout = '';
      let stdoutBytes = 0;
      let pending = '';
      let stderr = '';
      let settled = false;

      const onAbort = (): void => {
        killProcessTree(child.pid);
        fail(new Error('Aborted'));
      };

      const fail = (err: Error): void => {
        if (settled) return;
        settled = true;
        options.signal.removeEventListener('abort', onAbort);
        reject(err);
      };

      options.signal.addEventListener('abort', onAbort, { once: true });

      const emit = (line: string): void => {
        const event = parseStreamLine(line);
        if (!event || event.type !== 'assistant') return;
        try {
          options.onProgress({ kind: 'turn' });
          for (const block of event.message.content) {
            if (block.type === 'tool_use' && block.name) {
              options.onProgress({ kind: 'activity', detail: block.name });
            }
          }
        } catch {
          // callback error isolation
        }
      };

      child.stdout.on('data', (data: Buffer) => {
        stdoutBytes += data.byteLength;
        const chunk = data.toString();
        if (stdoutBytes <= MAX_OUTPUT_BYTES * 2) stdout += chunk;
        pending += chunk;
        const lines = pending.split('\n');
        pending = lines.pop() ?? '';
        for (const line of lines) emit(line);
      });
      child.stderr.on('data', (data: Buffer) => {
        const chunk = data.toString();
        if (stderr.length < 10_000) stderr += chunk;
        try {
          options.onProgress({ kind: 'activity', detail: chunk.trim().slice(0, 200) });
        } catch {
          // callback error isolation
        }
      });

      child.stdin.on('error', (err) => {
        if (stderr.length < 10_000) stderr += `stdin: ${err.message}\n`;
      });
      child.stdin.write(stdinData);
      child.stdin.end();

      child.on('error', (err) => {
        fail(new Error(`CLI subprocess failed: ${err.message}`));
      });

      child.on('close', (code) => {
        if (settled) return;
        settled = true;
        options.signal.removeEventListener('abort', onAbort);
        if (pending) emit(pending);
        // A max-turns stop exits non-zero but still carries a result event
        if (code !== 0 && !stdout.includes('"type":"result"')) {
          reject(new Error(`CLI subprocess exited with code ${code}: ${stderr.slice(0, 500)}`));
          return;
        }
        resolve(stdout);
      });
    });
  }
}

export function buildFilteredEnv(allowlist: string[]): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of allowlist) {
    const val = process.env[key];
    if (val !== undefined) {
      env[key] = val;
    }
  }
  return env;
}

export function killProcessTree(pid: number | undefined): void {
  if (pid === undefined) return;
  try {
    if (process.platform === 'win32') {
      spawn('taskkill', ['/pid', String(pid), '/T', '/F'], { stdio: 'ignore' });
    } else {
      process.kill(-pid, 'SIGTERM');
      setTimeout(() => {
        try {
          process.kill(-pid, 'SIGKILL');
        } catch {
          // Process may already be dead
        }
      }, 5000).unref();
    }
  } catch {
    // Process may already be dead
  }
}
