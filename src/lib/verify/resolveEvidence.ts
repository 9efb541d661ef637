import type { Finding, PageImage } from '../../types/verification';
import { describeError } from '../errors';
import { cropEvidenceRegion, ensureMinHeight, type CropPadding } from '../pdf/cropRegion';

export interface ResolveEvidenceOptions {
  /** crops shorter than this are scaled up for display */
  minHeight?: number;
  padding?: CropPadding;
  quality?: number;
}

export interface ResolvedEvidence {
  image: PageImage;
  /** false when the whole page is returned: no usable box, or the crop failed */
  cropped: boolean;
}

const DEFAULT_MIN_HEIGHT = 180;

/**
 * Finds the page a finding points at and cuts out its region. `images` is the
 * concatenated evidence + checked-document list the indices refer to.
 */
export async function resolveEvidence(
  finding: Finding,
  images: readonly PageImage[],
  options: ResolveEvidenceOptions = {}
): Promise<ResolvedEvidence | null> {
  const index = finding.image_index;
  if (index === null) return null;
  if (!Number.isInteger(index) || index < 0 || index >= images.length) {
    console.warn(`[resolve-evidence] image_index ${index} is out of range (${images.length} images)`);
    return null;
  }

  const page = images[index];
  if (!finding.box) {
    return { image: page, cropped: false };
  }

  try {
    const crop = await cropEvidenceRegion(page, finding.box, {
      padding: options.padding,
      quality: options.quality,
    });
    const image = await ensureMinHeight(crop, options.minHeight ?? DEFAULT_MIN_HEIGHT, options.quality);
    return { image, cropped: true };
  } catch (err) {
    console.warn(`[resolve-evidence] Crop failed on image ${index}, showing the full page:`, describeError(err));
    return { image: page, cropped: false };
  }
}
