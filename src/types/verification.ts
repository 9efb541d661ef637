export type FindingStatus = 'error' | 'warning' | 'suggestion';

/** [ymin, xmin, ymax, xmax] on a 0-1000 scale, independent of the image aspect ratio. */
export type NormalizedBox = [number, number, number, number];

export interface Finding {
  category: string;
  status: FindingStatus;
  item: string;
  evidence: string;
  target: string;
  message: string;
  box: NormalizedBox | null;
  image_index: number | null;
}

/** A finding as the model emitted it: shape unknown until normalized. */
export type RawFinding = Record<string, unknown>;

export interface PageImage {
  pageNumber: number;
  width: number;
  height: number;
  mimeType: 'image/jpeg';
  data: Buffer;
}

export interface PixelRect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export type ModelCompletion =
  | { kind: 'blocked'; reason: string }
  | { kind: 'completed'; finishReason: 'STOP' | 'MAX_TOKENS'; text: string };

export interface ModelRequest {
  prompt: string;
  images: readonly PageImage[];
  maxOutputTokens: number;
  signal?: AbortSignal;
}

export interface VisionModel {
  readonly modelId: string;
  generate(request: ModelRequest): Promise<ModelCompletion>;
}

export type VerificationState =
  | 'Idle'
  | 'RasterizingEvidence'
  | 'RasterizingTarget'
  | 'RunningFormCheck'
  | 'RunningCrossCheck'
  | 'Merging'
  | 'Done'
  | 'Failed';

export interface TraceEntry {
  step: string;
  status: 'success' | 'warning' | 'error' | 'info';
  detail: string;
  timestamp: string;
}

export interface FindingSummary {
  errors: number;
  /** warnings and suggestions together */
  warnings: number;
}

export interface VerificationResult {
  findings: Finding[];
  images: PageImage[];
  evidenceCount: number;
  targetCount: number;
  formCheck: 'ok' | 'failed';
  summary: FindingSummary;
  trace: TraceEntry[];
}

export interface PdfSource {
  name: string;
  data: Uint8Array;
}
