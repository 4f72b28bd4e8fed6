import { describe, it, expect, vi } from 'vitest';
import { parseAnnotateResponse, VisionOcrClient, VISION_ENDPOINT } from './visionClient';
import { OcrError } from '../errors';

function box(x0: number, y0: number, x1: number, y1: number) {
  return { vertices: [{ x: x0, y: y0 }, { x: x1, y: y0 }, { x: x1, y: y1 }, { x: x0, y: y1 }] };
}

const annotateBody = {
  responses: [{
    textAnnotations: [
      { description: "Q1'17\n0.45", boundingPoly: box(0, 0, 100, 300) },
      { description: "Q1'17", boundingPoly: box(10, 200, 40, 212) },
      { description: '0.45', confidence: 0.9, boundingPoly: { vertices: [{ y: 5 }, { x: 20, y: 5 }, { x: 20, y: 15 }, { y: 15 }] } },
      { description: 'stray', boundingPoly: { vertices: [{ x: 1, y: 1 }, { x: 2, y: 2 }] } },
    ],
  }],
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('parseAnnotateResponse', () => {
  it('maps word annotations to fragments, skipping the full-text block', () => {
    expect(parseAnnotateResponse(annotateBody)).toEqual([
      { text: "Q1'17", left: 10, top: 200, width: 30, height: 12, confidence: 100 },
      { text: '0.45', left: 0, top: 5, width: 20, height: 10, confidence: 90 },
    ]);
  });

  it('returns no fragments when nothing was detected', () => {
    expect(parseAnnotateResponse({ responses: [{}] })).toEqual([]);
    expect(parseAnnotateResponse({})).toEqual([]);
  });

  it('raises API error payloads', () => {
    expect(() => parseAnnotateResponse({ responses: [{ error: { code: 3, message: 'Bad image data.' } }] }))
      .toThrow('Vision API error: Bad image data.');
  });
});

describe('VisionOcrClient', () => {
  it('posts the image for text detection', async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse(annotateBody));
    const client = new VisionOcrClient({ apiKey: 'test-key', fetchFn });

    const fragments = await client.detect(Uint8Array.from([1, 2, 3]));

    expect(fragments).toHaveLength(2);
    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe(`${VISION_ENDPOINT}?key=test-key`);
    expect(JSON.parse(String(init?.body))).toEqual({
      requests: [{ image: { content: 'AQID' }, features: [{ type: 'TEXT_DETECTION' }] }],
    });
  });

  it('raises on an HTTP error status', async () => {
    const client = new VisionOcrClient({
      apiKey: 'test-key',
      fetchFn: async () => new Response('API key not valid', { status: 403 }),
    });

    const error = await client.detect(new Uint8Array()).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(OcrError);
    expect(error).toMatchObject({ status: 403, message: 'Vision API returned 403: API key not valid' });
  });

  it('wraps network failures', async () => {
    const client = new VisionOcrClient({
      apiKey: 'test-key',
      fetchFn: async () => {
        throw new TypeError('fetch failed');
      },
    });
    await expect(client.detect(new Uint8Array())).rejects.toThrow('Vision request failed: fetch failed');
  });
});
