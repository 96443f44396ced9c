import { readFile, stat } from 'node:fs/promises';
import { extname, isAbsolute, resolve } from 'node:path';
import { customId } from '../utils/id.js';
import { requireColumns } from './record-table.js';
import type { RecordTable } from './record-table.js';

export interface ImageContentPart {
  type: 'image_url';
  image_url: { url: string };
}

export interface TextContentPart {
  type: 'text';
  text: string;
}

export interface BatchRequestLine {
  custom_id: string;
  method: 'POST';
  url: '/v1/chat/completions';
  body: {
    model: string;
    messages: Array<{ role: 'user'; content: Array<TextContentPart | ImageContentPart> }>;
    max_tokens: number;
    temperature: number;
  };
}

export type EncodeResult =
  | { kind: 'request'; index: number; request: BatchRequestLine }
  | { kind: 'skip'; index: number; reason: string };

export interface RequestEncoder {
  encode(index: number): Promise<EncodeResult>;
}

export interface ImageEncoderOptions {
  model: string;
  imageColumn: string;
  promptColumn: string;
  imageRoot: string;
  maxImageBytes: number;
  maxPromptChars: number;
  maxTokens: number;
  temperature: number;
}

const MIME_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

function mimeFor(path: string): string {
  return MIME_TYPES[extname(path).toLowerCase()] ?? 'image/jpeg';
}

function formatMb(bytes: number): string {
  return `${(bytes / 1024 / 1024).toFixed(1)}MB`;
}

/**
 * Turns one table row into one chat-completions request with the image
 * inlined as a data URL. Rows that cannot be sent are reported as skips.
 */
export class ImageRequestEncoder implements RequestEncoder {
  constructor(
    private readonly table: RecordTable,
    private readonly opts: ImageEncoderOptions
  ) {
    requireColumns(table, [opts.imageColumn, opts.promptColumn]);
  }

  async encode(index: number): Promise<EncodeResult> {
    const row = this.table.rows[index];
    if (!row) {
      return { kind: 'skip', index, reason: `row ${index + 1} is outside the table` };
    }

    const imageRef = row.values[this.opts.imageColumn]?.trim() ?? '';
    let prompt = row.values[this.opts.promptColumn] ?? '';

    if (!imageRef) return { kind: 'skip', index, reason: 'empty image path' };
    if (!prompt.trim()) return { kind: 'skip', index, reason: 'empty prompt' };

    const imagePath = isAbsolute(imageRef) ? imageRef : resolve(this.opts.imageRoot, imageRef);

    let data: Buffer;
    try {
      const info = await stat(imagePath);
      if (!info.isFile()) {
        return { kind: 'skip', index, reason: `not a file: ${imageRef}` };
      }
      if (info.size > this.opts.maxImageBytes) {
        return { kind: 'skip', index, reason: `image too large: ${formatMb(info.size)}` };
      }
      data = await readFile(imagePath);
    } catch (err) {
      const code = err instanceof Error && 'code' in err ? String(err.code) : '';
      const reason = code === 'ENOENT'
        ? `image not found: ${imageRef}`
        : `unreadable image ${imageRef}: ${err instanceof Error ? err.message : String(err)}`;
      return { kind: 'skip', index, reason };
    }

    const base64 = data.toString('base64');
    if (base64.length > this.opts.maxImageBytes) {
      return { kind: 'skip', index, reason: `encoded image too large: ${formatMb(base64.length)}` };
    }

    if (prompt.length > this.opts.maxPromptChars) {
      console.warn(`  [warn] row ${index + 1}: prompt truncated from ${prompt.length} chars`);
      prompt = prompt.slice(0, this.opts.maxPromptChars) + '...';
    }

    return {
      kind: 'request',
      index,
      request: {
        custom_id: customId(index),
        method: 'POST',
        url: '/v1/chat/completions',
        body: {
          model: this.opts.model,
          messages: [
            {
              role: 'user',
              content: [
                { type: 'text', text: prompt },
                { type: 'image_url', image_url: { url: `data:${mimeFor(imagePath)};base64,${base64}` } },
              ],
            },
          ],
          max_tokens: this.opts.maxTokens,
          temperature: this.opts.temperature,
        },
      },
    };
  }
}

export function toJsonl(requests: BatchRequestLine[]): string {
  return requests.map((r) => JSON.stringify(r)).join('\n') + '\n';
}
