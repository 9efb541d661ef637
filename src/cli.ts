import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { parseArgs } from 'node:util';
import type { PdfSource, VerificationResult } from './types/verification';
import { loadConfig } from './lib/config';
import {
  DocumentReadError,
  ModelNotFoundError,
  ResponseParseError,
  SafetyBlockError,
  ValidationError,
  describeError,
} from './lib/errors';
import { formatTrace } from './lib/trace';
import { createGeminiModel } from './lib/ai/visionModel';
import { verifyDisclosure } from './lib/verify/runVerification';
import { resolveEvidence } from './lib/verify/resolveEvidence';

const USAGE = `Usage: disclosure-check --evidence <pdf> [--evidence <pdf> ...] --target <pdf>
                        [--out <dir>] [--model <id>] [--concurrent] [--json] [--trace]`;

const STATUS_LABEL = { error: 'ERROR', warning: 'WARN ', suggestion: 'NOTE ' } as const;

function parseCli(argv: string[]) {
  const { values } = parseArgs({
    args: argv,
    options: {
      evidence: { type: 'string', multiple: true },
      target: { type: 'string' },
      out: { type: 'string' },
      model: { type: 'string' },
      concurrent: { type: 'boolean' },
      json: { type: 'boolean' },
      trace: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
  });
  return values;
}

async function readSource(path: string): Promise<PdfSource> {
  try {
    return { name: basename(path), data: new Uint8Array(await readFile(path)) };
  } catch (err) {
    throw new DocumentReadError(`Could not read ${path}: ${describeError(err)}`, {
      cause: err,
      documentName: basename(path),
    });
  }
}

function printSummary(result: VerificationResult): void {
  console.log(
    `${result.evidenceCount} evidence page(s), ${result.targetCount} checked page(s)` +
      (result.formCheck === 'failed' ? ' (form check unavailable)' : '')
  );
  console.log(`Errors: ${result.summary.errors}  Warnings/suggestions: ${result.summary.warnings}`);
  result.findings.forEach((f, i) => {
    const where = f.image_index === null ? '' : ` [image ${f.image_index}]`;
    console.log(`${String(i + 1).padStart(3)}. ${STATUS_LABEL[f.status]} ${f.category}: ${f.item}${where}`);
    if (f.message) console.log(`       ${f.message}`);
  });
}

async function writeCrops(result: VerificationResult, outDir: string): Promise<number> {
  await mkdir(outDir, { recursive: true });
  let written = 0;
  for (const [i, finding] of result.findings.entries()) {
    const resolved = await resolveEvidence(finding, result.images);
    if (!resolved) continue;
    await writeFile(join(outDir, `finding-${i + 1}.jpg`), resolved.image.data);
    written++;
  }
  return written;
}

function explain(err: unknown): string {
  if (err instanceof ValidationError) return `Invalid input: ${err.message}`;
  if (err instanceof DocumentReadError) return `Could not read document: ${err.message}`;
  if (err instanceof SafetyBlockError) return err.message;
  if (err instanceof ResponseParseError) return `${err.message}. Try fewer pages or run again.`;
  if (err instanceof ModelNotFoundError) return `${err.message}. Set GEMINI_MODEL or pass --model.`;
  return `Unexpected error: ${describeError(err)}`;
}

async function main(argv: string[]): Promise<number> {
  let args: ReturnType<typeof parseCli>;
  try {
    args = parseCli(argv);
  } catch (err) {
    console.error(describeError(err));
    console.error(USAGE);
    return 2;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  const evidencePaths = args.evidence ?? [];
  if (evidencePaths.length === 0 || !args.target) {
    console.error(USAGE);
    return 2;
  }

  let result: VerificationResult;
  try {
    const config = loadConfig(process.env, {
      ...(args.model ? { model: args.model } : {}),
      ...(args.concurrent ? { concurrent: true } : {}),
    });
    const evidence = await Promise.all(evidencePaths.map(readSource));
    const target = await readSource(args.target);

    result = await verifyDisclosure(
      { evidence, target },
      { model: createGeminiModel(config.apiKey, config.model) },
      {
        concurrent: config.concurrent,
        rasterize: { dpi: config.renderDpi, quality: config.jpegQuality },
      }
    );
  } catch (err) {
    console.error(`[disclosure-check] ${explain(err)}`);
    if (err instanceof ResponseParseError && args.out) {
      await mkdir(args.out, { recursive: true });
      await writeFile(join(args.out, 'raw-response.txt'), err.rawResponse, 'utf8');
      console.error(`[disclosure-check] Raw response written to ${join(args.out, 'raw-response.txt')}`);
    }
    return 1;
  }

  if (args.json) {
    const images = result.images.map((img) => ({
      pageNumber: img.pageNumber,
      width: img.width,
      height: img.height,
      mimeType: img.mimeType,
    }));
    console.log(JSON.stringify({ ...result, images }, null, 2));
  } else {
    printSummary(result);
  }

  if (args.trace) {
    for (const line of formatTrace(result.trace)) console.error(line);
  }

  if (args.out) {
    const written = await writeCrops(result, args.out);
    console.log(`${written} evidence crop(s) written to ${args.out}`);
  }

  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('[disclosure-check] Fatal:', err);
    process.exitCode = 1;
  }
);
