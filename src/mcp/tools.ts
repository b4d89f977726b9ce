import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import sharp from 'sharp';
import { z } from 'zod';
import type { ClownifyOptions } from '../client/photoFuniaClient';
import type { ImageSource, PipelineOptions } from '../client/pipeline';
import { PhotoFuniaError, describeError } from '../client/errors';
import { type Logger, NoopLogger, field } from '../common/logger';

/** The part of PhotoFuniaClient the tools need. */
export interface EffectApplier {
  fatify(image: ImageSource, options?: PipelineOptions): Promise<Buffer>;
  clownify(image: ImageSource, options?: ClownifyOptions): Promise<Buffer>;
}

export const MAX_FILE_SIZE = 20 * 1024 * 1024; // 20MB

const FatifyArgsSchema = z.object({
  uri: z.url(),
});

const ClownifyArgsSchema = z.object({
  uri: z.url(),
  hat: z.boolean().default(false),
});

export const TOOL_DEFINITIONS = [
  {
    name: 'fatify',
    description: 'Apply the PhotoFunia "fat maker" face effect to an image',
    inputSchema: {
      type: 'object' as const,
      properties: {
        uri: { type: 'string', description: 'file:// URI to the image' },
      },
      required: ['uri'],
    },
  },
  {
    name: 'clownify',
    description: 'Apply the PhotoFunia clown effect to an image',
    inputSchema: {
      type: 'object' as const,
      properties: {
        uri: { type: 'string', description: 'file:// URI to the image' },
        hat: { type: 'boolean', description: 'Add a clown hat', default: false },
      },
      required: ['uri'],
    },
  },
];

/**
 * Runs tasks one after another in submission order. A failed task does not
 * stop the ones queued behind it.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const next = this.tail.then(task, task);
    // the caller observes failures through `next`
    this.tail = next.catch(() => undefined);
    return next;
  }
}

export interface ToolContext {
  client: EffectApplier;
  root: string;
  signal?: AbortSignal;
  logger?: Logger;
}

export type ImageToolResult = {
  content: { type: 'image'; data: string; mimeType: string }[];
};

/**
 * Resolves a file:// URI and checks it points at a readable file under root.
 */
export function resolveImagePath(uri: string, root: string): string {
  if (!uri.startsWith('file://')) {
    throw new McpError(ErrorCode.InvalidRequest, 'Only file:// URIs are supported');
  }
  const filePath = path.resolve(fileURLToPath(uri));
  const rel = path.relative(path.resolve(root), filePath);
  if (rel.startsWith('..') || path.isAbsolute(rel)) {
    throw new McpError(ErrorCode.InvalidRequest, `Path outside root directory: ${filePath}`);
  }

  let size: number;
  try {
    size = fs.statSync(filePath).size;
  } catch {
    throw new McpError(ErrorCode.InvalidRequest, `File not found: ${filePath}`);
  }
  if (size > MAX_FILE_SIZE) {
    throw new McpError(ErrorCode.InvalidRequest, `File too large: ${size} bytes (max ${MAX_FILE_SIZE})`);
  }
  return filePath;
}

const FORMAT_TO_MIME: Record<string, string> = {
  jpeg: 'image/jpeg',
  jpg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp',
  gif: 'image/gif',
  avif: 'image/avif',
  heif: 'image/heif',
  heic: 'image/heic',
  tiff: 'image/tiff',
  tif: 'image/tiff',
  svg: 'image/svg+xml',
};

/** The service serves JPEG results, so undecodable data is labelled as such. */
export const FALLBACK_MIME = 'image/jpeg';

/** Detects the container format of a result so the MCP client can render it. */
export async function detectImageMime(data: Buffer, logger: Logger = new NoopLogger()): Promise<string> {
  try {
    const { format } = await sharp(data).metadata();
    const mime = format ? FORMAT_TO_MIME[format] : undefined;
    if (mime) return mime;
    logger.info('unmapped image format, using fallback MIME type', field('format', format));
  } catch (err) {
    logger.info(
      'failed to read image metadata, using fallback MIME type',
      field('error', err instanceof Error ? err.message : String(err))
    );
  }
  return FALLBACK_MIME;
}

function parseArgs<T extends z.ZodType>(schema: T, args: unknown): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments: ${issues}`);
  }
  return parsed.data;
}

export async function callTool(name: string, args: unknown, ctx: ToolContext): Promise<ImageToolResult> {
  let run: () => Promise<Buffer>;

  if (name === 'fatify') {
    const { uri } = parseArgs(FatifyArgsSchema, args);
    const filePath = resolveImagePath(uri, ctx.root);
    run = () => ctx.client.fatify(fs.createReadStream(filePath), { signal: ctx.signal });
  } else if (name === 'clownify') {
    const { uri, hat } = parseArgs(ClownifyArgsSchema, args);
    const filePath = resolveImagePath(uri, ctx.root);
    run = () => ctx.client.clownify(fs.createReadStream(filePath), { includeHat: hat, signal: ctx.signal });
  } else {
    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }

  let result: Buffer;
  try {
    result = await run();
  } catch (error) {
    if (error instanceof PhotoFuniaError) {
      throw new McpError(ErrorCode.InternalError, `Failed to apply ${name}: ${describeError(error)}`);
    }
    throw error;
  }

  return {
    content: [
      {
        type: 'image',
        data: result.toString('base64'),
        mimeType: await detectImageMime(result, ctx.logger),
      },
    ],
  };
}
