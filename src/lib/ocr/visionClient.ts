// ============================================================
// OCR - GOOGLE CLOUD VISION TEXT DETECTION
// ============================================================

import { z } from 'zod';
import { validateFragments, type Fragment } from '@/contracts';
import { OcrError } from '../errors';

export const VISION_ENDPOINT = 'https://vision.googleapis.com/v1/images:annotate';

/** Anything that turns image bytes into positioned text fragments */
export interface OcrProvider {
  detect(bytes: Uint8Array): Promise<Fragment[]>;
}

const VertexSchema = z.object({
  x: z.number().optional(),
  y: z.number().optional(),
});

const TextAnnotationSchema = z.object({
  description: z.string().default(''),
  confidence: z.number().optional(),
  boundingPoly: z.object({ vertices: z.array(VertexSchema).default([]) }).optional(),
});

const AnnotateResponseSchema = z.object({
  responses: z.array(z.object({
    textAnnotations: z.array(TextAnnotationSchema).optional(),
    error: z.object({ code: z.number().optional(), message: z.string() }).optional(),
  })).default([]),
});

type TextAnnotation = z.infer<typeof TextAnnotationSchema>;

/**
 * Axis-aligned box from a word polygon. Missing or negative vertex coordinates
 * count as 0; polygons with fewer than three vertices are dropped.
 */
export function annotationToFragment(annotation: TextAnnotation): Fragment | null {
  const vertices = annotation.boundingPoly?.vertices ?? [];
  if (vertices.length < 3) return null;

  const xs = vertices.map(v => Math.max(0, v.x ?? 0));
  const ys = vertices.map(v => Math.max(0, v.y ?? 0));
  const left = Math.min(...xs);
  const top = Math.min(...ys);

  return {
    text: annotation.description,
    left,
    top,
    width: Math.max(...xs) - left,
    height: Math.max(...ys) - top,
    confidence: (annotation.confidence ?? 1) * 100,
  };
}

/**
 * Map an images:annotate response to fragments.
 * The first text annotation is the whole-image text block and is skipped.
 */
export function parseAnnotateResponse(body: unknown): Fragment[] {
  const parsed = AnnotateResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new OcrError(`Unexpected Vision response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
  }

  const first = parsed.data.responses[0];
  if (!first) return [];
  if (first.error) {
    throw new OcrError(`Vision API error: ${first.error.message}`, { status: first.error.code });
  }

  const fragments = (first.textAnnotations ?? [])
    .slice(1)
    .map(annotationToFragment)
    .filter((f): f is Fragment => f !== null);

  const validated = validateFragments(fragments);
  if (!validated.success) {
    throw new OcrError(`Invalid OCR fragments: ${validated.errors.issues[0]?.message ?? 'invalid'}`);
  }
  return validated.data;
}

export interface VisionOcrOptions {
  apiKey: string;
  timeoutMs?: number;
  /** Injected for tests */
  fetchFn?: typeof fetch;
}

export class VisionOcrClient implements OcrProvider {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: VisionOcrOptions) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async detect(bytes: Uint8Array): Promise<Fragment[]> {
    let response: Response;
    try {
      response = await this.fetchFn(`${VISION_ENDPOINT}?key=${encodeURIComponent(this.apiKey)}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          requests: [{
            image: { content: Buffer.from(bytes).toString('base64') },
            features: [{ type: 'TEXT_DETECTION' }],
          }],
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new OcrError(`Vision request failed: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new OcrError(`Vision API returned ${response.status}: ${errorText.slice(0, 200)}`, { status: response.status });
    }

    const body: unknown = await response.json();
    return parseAnnotateResponse(body);
  }
}
