import { z } from 'zod';

import { ContentFixer, PipelineLogger, silentLogger, Violation } from '@fixgate/domain';

import { FixBatchParams, FixCrossFileParams, FixerMethod, FixerTransport, FixOneParams } from './types.js';

const contentResultSchema = z.object({ content: z.string() });
const filesResultSchema = z.object({ files: z.record(z.string()) });

export interface RpcContentFixerOptions {
  transport: FixerTransport;
  logger?: PipelineLogger;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Removes a surrounding markdown code fence the backend may add despite instructions. */
export function stripCodeFence(content: string): string {
  if (!content.startsWith('```')) {
    return content;
  }

  const lines = content.split('\n');
  lines.shift();
  while (lines.length > 0 && lines[lines.length - 1]?.trim() === '') {
    lines.pop();
  }
  if (lines[lines.length - 1]?.startsWith('```')) {
    lines.pop();
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Maps a path returned by the backend onto one of the requested paths. The
 * backend may answer with an absolute or a shortened form of the same path.
 */
export function matchRequestedPath(returned: string, requested: readonly string[]): string | null {
  if (requested.includes(returned)) {
    return returned;
  }

  return requested.find((candidate) => candidate.endsWith(returned) || returned.endsWith(candidate)) ?? null;
}

/**
 * `ContentFixer` backed by a JSON-RPC fixer. Transport failures, timeouts and
 * malformed answers are logged and read as "could not fix": the input comes
 * back unchanged.
 */
export class RpcContentFixer implements ContentFixer {
  private readonly transport: FixerTransport;
  private readonly logger: PipelineLogger;

  constructor(options: RpcContentFixerOptions) {
    this.transport = options.transport;
    this.logger = options.logger ?? silentLogger;
  }

  async fixOne(content: string, violation: Violation): Promise<string> {
    const params: FixOneParams = { filePath: violation.file, content, violation };
    return this.fixContent('fix/one', params, content);
  }

  async fixBatch(content: string, violations: readonly Violation[]): Promise<string> {
    const params: FixBatchParams = { filePath: violations[0]?.file ?? null, content, violations };
    return this.fixContent('fix/batch', params, content);
  }

  async fixCrossFile(files: ReadonlyMap<string, string>, violations: readonly Violation[]): Promise<Map<string, string>> {
    const params: FixCrossFileParams = { files: Object.fromEntries(files), violations };
    const unchanged = new Map(files);

    let raw: unknown;
    try {
      raw = await this.transport.request('fix/crossFile', params);
    } catch (error) {
      this.logger.warn({ method: 'fix/crossFile', error: errorMessage(error) }, 'fixer request failed');
      return unchanged;
    }

    const parsed = filesResultSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ method: 'fix/crossFile' }, 'fixer returned an unexpected result');
      return unchanged;
    }

    const requested = Array.from(files.keys());
    const result = new Map(files);
    for (const [returnedPath, content] of Object.entries(parsed.data.files)) {
      const target = matchRequestedPath(returnedPath, requested);
      if (target === null) {
        this.logger.warn({ method: 'fix/crossFile', path: returnedPath }, 'fixer returned a file that was not requested');
        continue;
      }
      if (content.trim()) {
        result.set(target, stripCodeFence(content));
      }
    }

    return result;
  }

  private async fixContent(method: FixerMethod, params: FixOneParams | FixBatchParams, original: string): Promise<string> {
    let raw: unknown;
    try {
      raw = await this.transport.request(method, params);
    } catch (error) {
      this.logger.warn({ method, filePath: params.filePath, error: errorMessage(error) }, 'fixer request failed');
      return original;
    }

    const parsed = contentResultSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ method, filePath: params.filePath }, 'fixer returned an unexpected result');
      return original;
    }

    const content = stripCodeFence(parsed.data.content);
    return content.trim() ? content : original;
  }
}
