/**
 * Pass ordering for one frame.
 *
 * Each stage consumes the previous stage's output texture, so a frame is
 * always: every screen pass, then every temporal pass, then the ambient
 * pass. The renderer encodes exactly the list returned here.
 */

import { VIEW_INDICES, type ViewIndex } from './camera-array';

export type FramePass =
  | { readonly kind: 'screen'; readonly view: ViewIndex }
  | { readonly kind: 'temporal'; readonly view: ViewIndex }
  | { readonly kind: 'ambient' };

export interface FramePlanOptions {
  /** Views to render this frame. Defaults to both. */
  readonly views?: readonly ViewIndex[];
  readonly ambient?: boolean;
}

/**
 * Build the ordered pass list.
 *
 * Views are de-duplicated and emitted in ascending order. A skipped view
 * gets neither pass. The ambient pass reads view 0's output, so it is
 * dropped when view 0 is skipped.
 */
export function planFrame(options: FramePlanOptions = {}): FramePass[] {
  const requested = options.views ?? VIEW_INDICES;
  const views = VIEW_INDICES.filter((view) => requested.includes(view));

  const passes: FramePass[] = [];
  for (const view of views) passes.push({ kind: 'screen', view });
  for (const view of views) passes.push({ kind: 'temporal', view });
  if ((options.ambient ?? true) && views.includes(0)) {
    passes.push({ kind: 'ambient' });
  }
  return passes;
}

/** Stable label used for GPU debug markers and pass descriptors. */
export function passLabel(pass: FramePass): string {
  return pass.kind === 'ambient' ? 'ambient' : `${pass.kind}:${pass.view}`;
}
