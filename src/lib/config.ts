import { ValidationError } from './errors';

export const DEFAULT_MODEL = 'gemini-2.5-flash';
export const DEFAULT_RENDER_DPI = 200;
export const DEFAULT_JPEG_QUALITY = 85;

export interface AppConfig {
  apiKey: string;
  model: string;
  renderDpi: number;
  jpegQuality: number;
  concurrent: boolean;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new ValidationError(`${key} must be an integer between ${min} and ${max} (got "${raw}")`);
  }
  return n;
}

function readBool(env: Env, key: string): boolean {
  const raw = env[key]?.trim().toLowerCase();
  return raw === '1' || raw === 'true' || raw === 'yes';
}

/** Accepts both "gemini-2.5-flash" and the "models/gemini-2.5-flash" form. */
export function normalizeModelId(model: string): string {
  return model.trim().replace(/^models\//, '');
}

export function loadConfig(env: Env = process.env, overrides: Partial<AppConfig> = {}): AppConfig {
  const apiKey = (overrides.apiKey ?? env.GEMINI_API_KEY ?? env.GOOGLE_API_KEY ?? '').trim();
  if (!apiKey) {
    throw new ValidationError('GEMINI_API_KEY (or GOOGLE_API_KEY) is not configured');
  }

  const model = normalizeModelId(overrides.model ?? env.GEMINI_MODEL ?? DEFAULT_MODEL);
  if (!model) {
    throw new ValidationError('GEMINI_MODEL must not be empty');
  }

  return {
    apiKey,
    model,
    renderDpi: overrides.renderDpi ?? readInt(env, 'RENDER_DPI', DEFAULT_RENDER_DPI, 72, 600),
    jpegQuality: overrides.jpegQuality ?? readInt(env, 'JPEG_QUALITY', DEFAULT_JPEG_QUALITY, 1, 100),
    concurrent: overrides.concurrent ?? readBool(env, 'VERIFY_CONCURRENT'),
  };
}
