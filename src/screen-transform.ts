/**
 * Placement of the virtual screen in the tracking space.
 *
 * The plane mesh spans [-1, 1] on X and Y, so a screen `scale` meters wide
 * uses a half-extent of `scale / 2`, and the height follows the source
 * aspect ratio. The screen sits `distance` meters in front of the origin
 * (along -Z).
 */

import { mat4, type Mat4 } from 'wgpu-matrix';

/** Byte size of the model uniform buffer. */
export const MODEL_BUFFER_SIZE = 64;

export interface ScreenPlacement {
  readonly distance: number;
  readonly scale: number;
  readonly aspectRatio: number;
}

export class ScreenTransform {
  private distance: number;
  private scale: number;
  private aspectRatio: number;
  private matrix: Mat4;

  constructor(placement: ScreenPlacement) {
    this.distance = placement.distance;
    this.scale = placement.scale;
    this.aspectRatio = placement.aspectRatio;
    this.matrix = this.buildMatrix();
  }

  get modelMatrix(): Mat4 {
    return this.matrix;
  }

  get placement(): ScreenPlacement {
    return { distance: this.distance, scale: this.scale, aspectRatio: this.aspectRatio };
  }

  changeAspectRatio(aspectRatio: number): void {
    this.aspectRatio = aspectRatio;
    this.matrix = this.buildMatrix();
  }

  changeScale(scale: number): void {
    this.scale = scale;
    this.matrix = this.buildMatrix();
  }

  changeDistance(distance: number): void {
    this.distance = distance;
    this.matrix = this.buildMatrix();
  }

  private buildMatrix(): Mat4 {
    const halfWidth = this.scale / 2;
    return mat4.multiply(
      mat4.translation([0, 0, -this.distance]),
      mat4.scaling([halfWidth, this.scale / (2 * this.aspectRatio), halfWidth]),
    );
  }
}
