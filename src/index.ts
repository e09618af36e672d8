/**
 * stereoscreen: WebGPU curved-screen renderer for side-by-side stereo video.
 */

// Configuration
export {
  SCREEN_CONFIG,
  resolveScreenConfig,
  toggleSetting,
  screenPlacement,
  temporalBlurFromConfig,
  frameOptions,
} from './config';
export type { ScreenConfig, ToggleSetting } from './config';
export { stereoFlags, isSideBySide, eyeAspectRatio } from './stereo-mode';
export type { StereoMode, StereoFlags } from './stereo-mode';
export {
  buildScreenParams,
  packScreenParams,
  SCREEN_PARAMS_STRUCT_SIZE,
  SCREEN_PARAMS_BUFFER_SIZE,
} from './screen-params';
export type { ScreenParams, SourceDescriptor } from './screen-params';

// Shading stages (CPU reference)
export { curvatureOffset, curvePosition, projectCurvedVertex, projectFlatVertex } from './curvature';
export type { UV, Vec3Tuple } from './curvature';
export { mapStereoUV, mapMonoUV, mapStereoUVLegacy } from './stereo-uv';
export {
  luminance,
  temporalBlendPixel,
  temporalBlendImage,
  buildTemporalBlurParams,
  packTemporalBlurParams,
  LUMINANCE_WEIGHTS,
  TEMPORAL_BLUR_BUFFER_SIZE,
} from './temporal-blend';
export type { TemporalBlurParams, TemporalBlendResult } from './temporal-blend';
export { vignetteFactor, ambientStep, ambientPixel, ambientImage, AMBIENT_KERNEL } from './ambient-vignette';
export type { KernelTap } from './ambient-vignette';
export { halton, getJitter, JITTER_SEQUENCE_LENGTH } from './jitter';
export { createImage, readPixel, writePixel, sampleImage, renderImage } from './image';
export type { Rgba, RgbaImage } from './image';

// Cameras and screen placement
export {
  projectionFromTangents,
  worldFromPose,
  viewProjectionFromPose,
  createCameraArray,
  identityCameraArray,
  selectViewProjection,
  packCameraArray,
  isViewIndex,
  VIEW_COUNT,
  VIEW_INDICES,
} from './camera-array';
export type { CameraArray, ViewIndex, FieldOfView, EyePose } from './camera-array';
export { ScreenTransform } from './screen-transform';
export type { ScreenPlacement } from './screen-transform';
export { createPlaneMesh } from './mesh';
export type { PlaneMesh } from './mesh';
export { recenterOrientation } from './recenter';

// Frame orchestration
export { resolveScreenStrategy, SCREEN_STRATEGIES } from './screen-strategy';
export type { ScreenRenderStrategy, ScreenGeometry, ScreenSampling, StrategyUniforms } from './screen-strategy';
export { createFrameSnapshot } from './frame-snapshot';
export type { FrameSnapshot } from './frame-snapshot';
export { HistoryBuffer } from './history-buffer';
export type { HistorySlot } from './history-buffer';
export { planFrame, passLabel } from './frame-plan';
export type { FramePass, FramePlanOptions } from './frame-plan';

// WebGPU
export { ScreenRendererWebGPU, HISTORY_FORMAT } from './screen-renderer-webgpu';
export type { ScreenRendererConfig, RenderFrameOptions, RenderFrameResult } from './screen-renderer-webgpu';
export { acquireScreenDevice, isWebGPUAvailable } from './gpu-backend';
export type { ScreenDevice, AcquireDeviceOptions } from './gpu-backend';
export { resolveQuality, classifyAdapter } from './quality';
export type { QualityParams, QualityTier } from './quality';
