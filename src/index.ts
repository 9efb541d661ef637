export { verifyDisclosure, verifyImages } from './lib/verify/runVerification';
export type { VerifyDeps, VerifyOptions, DisclosureInput, ImageInput } from './lib/verify/runVerification';
export { VerificationRun } from './lib/verify/verificationRun';
export type { StateListener } from './lib/verify/verificationRun';
export {
  mergeFindings,
  summarizeFindings,
  shiftImageIndices,
  isGatingFinding,
  formCheckFailedFinding,
} from './lib/verify/mergeFindings';
export type { FormPassResult } from './lib/verify/mergeFindings';
export { resolveEvidence } from './lib/verify/resolveEvidence';
export { buildFormCheckPrompt, buildCrossCheckPrompt } from './lib/verify/prompts';

export { rasterizePdf, rasterizeDocuments } from './lib/pdf/rasterize';
export type { RasterizeOptions } from './lib/pdf/rasterize';
export { computeCropRect, cropEvidenceRegion, ensureMinHeight, DEFAULT_CROP_PADDING } from './lib/pdf/cropRegion';
export type { CropPadding, CropOptions } from './lib/pdf/cropRegion';

export { parseFindingsResponse, stripCodeFences } from './lib/ai/parseFindings';
export { toFinding, toFindings, normalizeBox } from './lib/ai/normalizeFinding';
export { GeminiVisionModel, createGeminiModel, toCompletion } from './lib/ai/visionModel';

export { loadConfig } from './lib/config';
export type { AppConfig } from './lib/config';
export * from './lib/errors';
export { formatTrace } from './lib/trace';
export type * from './types/verification';
