/**
 * GPU Backend: WebGPU adapter and device acquisition.
 *
 * The renderer needs 2D array render targets and per-layer passes, so there
 * is no WebGL2 fallback: when WebGPU is missing or the adapter request
 * hangs, acquisition fails with an error the host can report.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ScreenDevice {
  readonly adapter: GPUAdapter;
  readonly adapterInfo: GPUAdapterInfo;
  readonly device: GPUDevice;
}

export interface AcquireDeviceOptions {
  /** GPU entry point. Defaults to `navigator.gpu`. */
  readonly gpu?: GPU;
  /** Maximum time to wait for the adapter, in milliseconds. */
  readonly timeoutMs?: number;
  readonly powerPreference?: GPUPowerPreference;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Maximum time to wait for adapter request before giving up. */
export const ADAPTER_TIMEOUT_MS = 1500;

// ---------------------------------------------------------------------------
// Sync check
// ---------------------------------------------------------------------------

/**
 * Synchronous check for WebGPU API availability.
 *
 * Returns true if `navigator.gpu` exists. Does NOT request an adapter,
 * so this cannot confirm actual WebGPU support; use `acquireScreenDevice()`
 * for a definitive answer.
 */
export function isWebGPUAvailable(): boolean {
  return typeof navigator !== 'undefined' && 'gpu' in navigator;
}

// ---------------------------------------------------------------------------
// Async acquisition
// ---------------------------------------------------------------------------

/**
 * Request a high-performance adapter (with a timeout) and a device from it.
 *
 * @throws when WebGPU is unavailable, the adapter request returns null or
 * times out, or the device request rejects.
 */
export async function acquireScreenDevice(options: AcquireDeviceOptions = {}): Promise<ScreenDevice> {
  const gpu = options.gpu ?? (isWebGPUAvailable() ? navigator.gpu : undefined);
  if (!gpu) {
    throw new Error('[GPUBackend] WebGPU not available: navigator.gpu is undefined.');
  }

  const timeoutMs = options.timeoutMs ?? ADAPTER_TIMEOUT_MS;
  const adapter = await requestAdapterWithTimeout(
    gpu,
    options.powerPreference ?? 'high-performance',
    timeoutMs
  );
  if (!adapter) {
    throw new Error(`[GPUBackend] No WebGPU adapter within ${timeoutMs} ms.`);
  }

  const device = await adapter.requestDevice({ label: 'stereoscreen' });
  return { adapter, adapterInfo: adapter.info, device };
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Request a WebGPU adapter, resolving null if it takes longer than `timeoutMs`. */
async function requestAdapterWithTimeout(
  gpu: GPU,
  powerPreference: GPUPowerPreference,
  timeoutMs: number
): Promise<GPUAdapter | null> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), timeoutMs);
  });

  try {
    return await Promise.race([gpu.requestAdapter({ powerPreference }), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}
