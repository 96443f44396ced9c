import { describe, it, expect, beforeEach } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ImageRequestEncoder, toJsonl } from '../records/request-encoder.js';
import { parseRecordTable } from '../records/record-table.js';
import type { BatchRequestLine, ImageEncoderOptions } from '../records/request-encoder.js';
import { makeTempDir, silenceConsole } from './fixtures.js';

// The first four bytes of a PNG file.
const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47]);

function options(imageRoot: string, overrides: Partial<ImageEncoderOptions> = {}): ImageEncoderOptions {
  return {
    model: 'gpt-4o-mini',
    imageColumn: 'image_path',
    promptColumn: 'prompt',
    imageRoot,
    maxImageBytes: 1024,
    maxPromptChars: 10,
    maxTokens: 300,
    temperature: 0.2,
    ...overrides,
  };
}

describe('ImageRequestEncoder', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    await writeFile(join(dir, 'a.png'), PNG_BYTES);
    await writeFile(join(dir, 'b.bmp'), PNG_BYTES);
    await writeFile(join(dir, 'big.png'), Buffer.alloc(2048));
    await writeFile(join(dir, 'wide.png'), Buffer.alloc(900));
    await mkdir(join(dir, 'sub'));
  });

  function encoderFor(csv: string, overrides: Partial<ImageEncoderOptions> = {}) {
    return new ImageRequestEncoder(parseRecordTable(csv), options(dir, overrides));
  }

  it('builds a chat-completions request with the image inlined', async () => {
    const result = await encoderFor('image_path,prompt\na.png,What is it?\n', { maxPromptChars: 4000 }).encode(0);

    expect(result).toEqual({
      kind: 'request',
      index: 0,
      request: {
        custom_id: 'row_0',
        method: 'POST',
        url: '/v1/chat/completions',
        body: {
          model: 'gpt-4o-mini',
          messages: [
            {
              role: 'user',
              content: [
                { type: 'text', text: 'What is it?' },
                { type: 'image_url', image_url: { url: 'data:image/png;base64,iVBORw==' } },
              ],
            },
          ],
          max_tokens: 300,
          temperature: 0.2,
        },
      },
    });
  });

  it('resolves absolute image paths as given', async () => {
    const result = await encoderFor(`image_path,prompt\n${join(dir, 'a.png')},Hi\n`).encode(0);
    expect(result.kind).toBe('request');
  });

  it('falls back to image/jpeg for unknown extensions', async () => {
    const result = await encoderFor('image_path,prompt\nb.bmp,Hi\n').encode(0);
    expect(result.kind === 'request' && result.request.body.messages[0].content[1]).toEqual({
      type: 'image_url',
      image_url: { url: 'data:image/jpeg;base64,iVBORw==' },
    });
  });

  it('truncates long prompts', async () => {
    const spies = silenceConsole();
    const result = await encoderFor('image_path,prompt\na.png,abcdefghijklmno\n').encode(0);

    expect(result.kind === 'request' && result.request.body.messages[0].content[0]).toEqual({
      type: 'text',
      text: 'abcdefghij...',
    });
    expect(spies.warn).toHaveBeenCalledWith('  [warn] row 1: prompt truncated from 15 chars');
  });

  it('skips rows it cannot send', async () => {
    const encoder = encoderFor(
      'image_path,prompt\n' +
      ',Hi\n' +
      'a.png,   \n' +
      'missing.png,Hi\n' +
      'sub,Hi\n' +
      'big.png,Hi\n' +
      'wide.png,Hi\n'
    );

    const reasons: string[] = [];
    for (let i = 0; i < 7; i++) {
      const result = await encoder.encode(i);
      reasons.push(result.kind === 'skip' ? result.reason : 'request');
    }

    expect(reasons).toEqual([
      'empty image path',
      'empty prompt',
      'image not found: missing.png',
      'not a file: sub',
      'image too large: 0.0MB',
      'encoded image too large: 0.0MB',
      'row 7 is outside the table',
    ]);
  });

  it('requires the image and prompt columns', () => {
    expect(() => encoderFor('path,text\na.png,Hi\n')).toThrow(
      'Record table is missing column(s): image_path, prompt (found: path, text)'
    );
  });
});

describe('toJsonl', () => {
  it('writes one request per line', async () => {
    const dir = await makeTempDir();
    await writeFile(join(dir, 'a.png'), PNG_BYTES);
    const encoder = new ImageRequestEncoder(parseRecordTable('image_path,prompt\na.png,One\na.png,Two\n'), options(dir));

    const requests: BatchRequestLine[] = [];
    for (const index of [0, 1]) {
      const result = await encoder.encode(index);
      if (result.kind === 'request') requests.push(result.request);
    }

    const lines = toJsonl(requests).split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('');
    expect(JSON.parse(lines[1])).toMatchObject({ custom_id: 'row_1' });
  });
});
