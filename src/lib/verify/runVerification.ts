import type {
  Finding,
  ModelRequest,
  PageImage,
  PdfSource,
  VerificationResult,
  VisionModel,
} from '../../types/verification';
import { ResponseParseError, SafetyBlockError, ValidationError } from '../errors';
import { parseFindingsResponse } from '../ai/parseFindings';
import { toFindings } from '../ai/normalizeFinding';
import { rasterizeDocuments, type RasterizeOptions } from '../pdf/rasterize';
import {
  buildCrossCheckPrompt,
  buildFormCheckPrompt,
  CROSS_CHECK_MAX_OUTPUT_TOKENS,
  FORM_CHECK_MAX_OUTPUT_TOKENS,
} from './prompts';
import { mergeFindings, summarizeFindings, type FormPassResult } from './mergeFindings';
import { VerificationRun, type StateListener } from './verificationRun';

export interface VerifyDeps {
  model: VisionModel;
}

export interface VerifyOptions {
  /** Issue the form and cross-reference calls together instead of one after the other. */
  concurrent?: boolean;
  signal?: AbortSignal;
  onStateChange?: StateListener;
  rasterize?: RasterizeOptions;
}

export interface DisclosureInput {
  evidence: readonly PdfSource[];
  target: PdfSource;
}

export interface ImageInput {
  evidence: readonly PageImage[];
  target: readonly PageImage[];
}

/** One model call: completion status is checked before the text is trusted. */
async function runPass(model: VisionModel, request: ModelRequest, label: string): Promise<Finding[]> {
  const completion = await model.generate(request);

  if (completion.kind === 'blocked') {
    throw new SafetyBlockError(
      `The ${label} was interrupted by the model's safety limits (${completion.reason}). Review the request or try again.`,
      completion.reason
    );
  }

  if (!completion.text) {
    if (completion.finishReason === 'MAX_TOKENS') {
      throw new ResponseParseError(
        `The ${label} reached the output limit before returning any findings. Reduce the number of pages and retry.`,
        ''
      );
    }
    return [];
  }

  return toFindings(parseFindingsResponse(completion.text));
}

async function runChecks(
  run: VerificationRun,
  input: ImageInput,
  deps: VerifyDeps,
  options: VerifyOptions
): Promise<VerificationResult> {
  const { model } = deps;
  const { signal } = options;
  const evidence = [...input.evidence];
  const target = [...input.target];
  const images = [...evidence, ...target];

  const runForm = async (): Promise<FormPassResult> => {
    try {
      const findings = await runPass(
        model,
        {
          prompt: buildFormCheckPrompt(target.length),
          images: target,
          maxOutputTokens: FORM_CHECK_MAX_OUTPUT_TOKENS,
          signal,
        },
        'form check'
      );
      run.note('Form check', 'success', `${findings.length} finding(s)`);
      return { ok: true, findings };
    } catch (err) {
      if (err instanceof SafetyBlockError || err instanceof ResponseParseError) {
        console.warn('[verify] Form check failed, continuing with cross-reference only:', err.message);
        run.note('Form check', 'warning', `${err.code}: ${err.message}`);
        return { ok: false };
      }
      throw err;
    }
  };

  const runCross = async (): Promise<Finding[]> => {
    const findings = await runPass(
      model,
      {
        prompt: buildCrossCheckPrompt(evidence.length, target.length),
        images,
        maxOutputTokens: CROSS_CHECK_MAX_OUTPUT_TOKENS,
        signal,
      },
      'cross-reference check'
    );
    run.note('Cross-reference check', 'success', `${findings.length} finding(s)`);
    return findings;
  };

  let formPass: FormPassResult;
  let crossFindings: Finding[];

  signal?.throwIfAborted();
  if (options.concurrent) {
    run.transition('RunningFormCheck', `Form check on ${target.length} page(s) (concurrent)`);
    const formPromise = runForm();
    run.transition('RunningCrossCheck', `Cross-reference check on ${images.length} image(s) (concurrent)`);
    [formPass, crossFindings] = await Promise.all([formPromise, runCross()]);
  } else {
    run.transition('RunningFormCheck', `Form check on ${target.length} page(s)`);
    formPass = await runForm();
    signal?.throwIfAborted();
    run.transition('RunningCrossCheck', `Cross-reference check on ${images.length} image(s)`);
    crossFindings = await runCross();
  }

  run.transition('Merging', 'Merging form and cross-reference findings');
  const findings = mergeFindings(formPass, crossFindings, evidence.length);
  const summary = summarizeFindings(findings);
  run.transition('Done', `${summary.errors} error(s), ${summary.warnings} warning(s)/suggestion(s)`);

  return {
    findings,
    images,
    evidenceCount: evidence.length,
    targetCount: target.length,
    formCheck: formPass.ok ? 'ok' : 'failed',
    summary,
    trace: run.trace,
  };
}

function assertImages(input: ImageInput): void {
  if (input.evidence.length === 0) {
    throw new ValidationError('No evidence images to check against');
  }
  if (input.target.length === 0) {
    throw new ValidationError('No images of the checked document');
  }
}

/** Runs both model passes on pages that are already rendered. */
export async function verifyImages(
  input: ImageInput,
  deps: VerifyDeps,
  options: VerifyOptions = {}
): Promise<VerificationResult> {
  const run = new VerificationRun(options.onStateChange);
  try {
    assertImages(input);
    return await runChecks(run, input, deps, options);
  } catch (err) {
    run.fail(err);
    throw err;
  }
}

/**
 * End-to-end verification: rasterize the evidence PDFs and the checked PDF, run the
 * form and cross-reference passes, and merge. Any rasterization error aborts the request.
 */
export async function verifyDisclosure(
  input: DisclosureInput,
  deps: VerifyDeps,
  options: VerifyOptions = {}
): Promise<VerificationResult> {
  const run = new VerificationRun(options.onStateChange);
  try {
    if (input.evidence.length === 0) {
      throw new ValidationError('At least one evidence document is required');
    }

    run.transition('RasterizingEvidence', `${input.evidence.length} evidence document(s)`);
    const evidence = await rasterizeDocuments(input.evidence, options.rasterize);
    run.note('Rasterize', 'success', `Evidence: ${evidence.length} page(s)`);
    options.signal?.throwIfAborted();

    run.transition('RasterizingTarget', input.target.name);
    const target = await rasterizeDocuments([input.target], options.rasterize);
    run.note('Rasterize', 'success', `Target: ${target.length} page(s)`);

    const images: ImageInput = { evidence, target };
    assertImages(images);
    return await runChecks(run, images, deps, options);
  } catch (err) {
    run.fail(err);
    throw err;
  }
}
