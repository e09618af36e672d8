/**
 * Quality tiers: adapter classification and per-tier render parameters.
 *
 * Classifies the WebGPU adapter once at init time into a quality tier
 * (high / medium / low) and resolves the parameters the renderer consumes:
 *
 * - **Mesh density**: screen grid rows × columns (100 / 64 / 32)
 * - **Ambient width**: ambient target width in texels (256 / 128 / 64)
 * - **Temporal blend**: history accumulation on / on / off
 *
 * Override precedence: explicit tier > classified tier.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Device quality classification. */
export type QualityTier = 'high' | 'medium' | 'low';

/** Concrete rendering parameters resolved from a quality tier. */
export interface QualityParams {
  readonly tier: QualityTier;
  /** Screen mesh vertex rows. */
  readonly meshRows: number;
  /** Screen mesh vertex columns. */
  readonly meshColumns: number;
  /** Ambient target width in texels (height follows the aspect ratio). */
  readonly ambientWidth: number;
  /**
   * When false the temporal pass still runs (it produces the display
   * image), but with a history decay of 0.
   */
  readonly temporalBlend: boolean;
}

/** The subset of `GPUAdapterInfo` classification reads. */
export type AdapterDescription = Pick<GPUAdapterInfo, 'vendor' | 'architecture' | 'device' | 'description'>;

// ---------------------------------------------------------------------------
// Tier parameter map
// ---------------------------------------------------------------------------

const TIER_PARAMS: Record<QualityTier, Omit<QualityParams, 'tier'>> = {
  high: {
    meshRows: 100,
    meshColumns: 100,
    ambientWidth: 256,
    temporalBlend: true,
  },
  medium: {
    meshRows: 64,
    meshColumns: 64,
    ambientWidth: 128,
    temporalBlend: true,
  },
  low: {
    meshRows: 32,
    meshColumns: 32,
    ambientWidth: 64,
    temporalBlend: false,
  },
};

// ---------------------------------------------------------------------------
// Adapter classification
// ---------------------------------------------------------------------------

/**
 * Known low-end GPU string patterns.
 *
 * Matched case-insensitively against the adapter's vendor, architecture,
 * device and description.
 */
const LOW_END_GPU_PATTERNS = [
  'mali-4',
  'mali-t',
  'adreno 3',
  'adreno 4',
  'adreno 5',
  'powervr sgx',
  'intel hd graphics',
  'intel uhd graphics',
  'llvmpipe',
  'swiftshader',
  'software',
];

/**
 * Known high-end GPU string patterns.
 */
const HIGH_END_GPU_PATTERNS = [
  'nvidia',
  'geforce',
  'radeon rx',
  'radeon pro',
  'apple m',
  'adreno 7',
  'adreno 6',
  'mali-g7',
  'mali-g6',
];

/**
 * Classify an adapter into a quality tier.
 *
 * Low-end matches win over high-end ones (a software rasterizer can report a
 * high-end vendor). An adapter matching neither list is `medium`.
 */
export function classifyAdapter(info: AdapterDescription): QualityTier {
  const text = [info.vendor, info.architecture, info.device, info.description]
    .join(' ')
    .toLowerCase();

  if (LOW_END_GPU_PATTERNS.some((p) => text.includes(p))) return 'low';
  if (HIGH_END_GPU_PATTERNS.some((p) => text.includes(p))) return 'high';
  return 'medium';
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Resolve quality parameters for the renderer.
 *
 * - If `quality` is a specific tier, return that tier's parameters directly.
 * - If `quality` is 'auto' or undefined, classify the adapter.
 */
export function resolveQuality(
  adapterInfo: AdapterDescription,
  quality?: 'auto' | QualityTier
): QualityParams {
  const tier = quality && quality !== 'auto' ? quality : classifyAdapter(adapterInfo);
  return { tier, ...TIER_PARAMS[tier] };
}
