/**
 * Decoding of raw tool-call arguments. Models often wrap JSON in markdown
 * fences or surround it with prose; both are tolerated here.
 */

const CODE_FENCE_RE = /```json\n?|```\n?/gi;

export type DecodeResult = { ok: true; value: unknown } | { ok: false; error: string };

export function stripMarkdownCodeFence(output: string): string {
  const trimmed = output.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }
  return trimmed.replace(CODE_FENCE_RE, '').trim();
}

export function extractJsonObject(output: string): string | undefined {
  const firstBrace = output.indexOf('{');
  const lastBrace = output.lastIndexOf('}');
  if (firstBrace === -1 || lastBrace === -1 || firstBrace > lastBrace) {
    return undefined;
  }
  return output.slice(firstBrace, lastBrace + 1);
}

function tryParse(text: string): DecodeResult {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

export function decodeJson(raw: string): DecodeResult {
  const direct = tryParse(raw);
  if (direct.ok) {
    return direct;
  }

  const cleaned = stripMarkdownCodeFence(raw);
  if (cleaned !== raw) {
    const fenced = tryParse(cleaned);
    if (fenced.ok) {
      return fenced;
    }
  }

  const extracted = extractJsonObject(cleaned);
  if (extracted && extracted !== cleaned) {
    const inner = tryParse(extracted);
    if (inner.ok) {
      return inner;
    }
  }

  return direct;
}
