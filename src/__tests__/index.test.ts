import { describe, it, expect } from 'vitest';
import * as disclosureCheck from '../index';
import {
  DocumentReadError,
  VerificationError,
  mergeFindings,
  parseFindingsResponse,
  verifyImages,
} from '../index';
import type { Finding, VisionModel } from '../index';

describe('package entry point', () => {
  it('exposes the verification API', () => {
    expect(typeof disclosureCheck.verifyDisclosure).toBe('function');
    expect(typeof disclosureCheck.verifyImages).toBe('function');
    expect(typeof disclosureCheck.resolveEvidence).toBe('function');
    expect(typeof disclosureCheck.rasterizePdf).toBe('function');
    expect(typeof disclosureCheck.cropEvidenceRegion).toBe('function');
    expect(typeof disclosureCheck.createGeminiModel).toBe('function');
    expect(typeof disclosureCheck.loadConfig).toBe('function');
    expect(disclosureCheck.DEFAULT_CROP_PADDING).toEqual({ y: 0.5, x: 0.3 });
  });

  it('exports the error classes', () => {
    const err = new DocumentReadError('unreadable', { documentName: 'scan.pdf' });
    expect(err).toBeInstanceOf(VerificationError);
    expect(err.code).toBe('document_read');
  });

  it('runs a verification through the exported functions', async () => {
    const model: VisionModel = {
      modelId: 'fake-model',
      async generate(request) {
        return {
          kind: 'completed',
          finishReason: 'STOP',
          text: request.maxOutputTokens === 4096 ? '[]' : '[{"category":"Area","status":"error","item":"Land area"}]',
        };
      },
    };
    const page = { pageNumber: 1, width: 10, height: 10, mimeType: 'image/jpeg' as const, data: Buffer.from('p') };

    const result = await verifyImages({ evidence: [page], target: [page] }, { model });
    const items: Finding[] = result.findings;

    expect(items.map((f) => f.item)).toEqual(['Land area']);
    expect(parseFindingsResponse('[{"a":1}]')).toEqual([{ a: 1 }]);
    expect(mergeFindings({ ok: false }, [], 0)).toHaveLength(1);
  });
});
