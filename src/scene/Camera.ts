import { type Mat4, mat4 } from "wgpu-matrix";
import type { Size } from "../coreTypes/Size";
import type { Transform } from "../coreTypes/Transform";
import type { Float2, Float3 } from "../coreTypes/Vec";

export type CameraOptions = {
  /** screen size in pixels */
  screen?: Size;
  /**
   * Resolution the layout was designed for. When set, everything is scaled by
   * `screen.height / reference.height`.
   */
  reference?: Size;
  zoom?: number;
};

/**
 * 2D camera producing the transforms the canvas draws with. Pixels are y-down
 * with the origin in the top left corner of the screen.
 */
export class Camera {
  /** world position of the top left corner of the view */
  eye: Float2 = [0, 0];
  zoom: number;

  #screen: Size = { width: 0, height: 0 };
  #reference: Size | null;
  #proj: Mat4 = mat4.identity();
  #view: Mat4 = mat4.identity();

  constructor(options: CameraOptions = {}) {
    this.zoom = options.zoom ?? 1;
    this.#reference = options.reference ?? null;
    if (options.screen) {
      this.resize(options.screen);
    }
  }

  get screen(): Size {
    return this.#screen;
  }

  /**
   * Rebuilds the projection for a new screen size.
   */
  resize(screen: Size) {
    if (
      screen.width === this.#screen.width &&
      screen.height === this.#screen.height
    ) {
      return;
    }
    this.#screen = { width: screen.width, height: screen.height };
    // content is flat at z = 0, one unit in front of the eye
    mat4.ortho(0, screen.width, screen.height, 0, -2, 2, this.#proj);
    mat4.lookAt([0, 0, 1], [0, 0, 0], [0, 1, 0], this.#view);
  }

  get reference(): Size | null {
    return this.#reference;
  }

  set reference(value: Size | null) {
    this.#reference = value;
  }

  get resolutionScale(): number {
    if (!this.#reference || this.#reference.height <= 0) {
      return 1;
    }
    return this.#screen.height / this.#reference.height;
  }

  get scaling(): Float3 {
    const s = this.resolutionScale * this.zoom;
    return [s, s, 1];
  }

  /**
   * Size of the screen in layout units.
   */
  viewport(): Size {
    const scale = this.resolutionScale;
    return {
      width: this.#screen.width / scale,
      height: this.#screen.height / scale,
    };
  }

  /**
   * Moves the eye so `point` ends up in the middle of the screen.
   */
  lookAt(point: Float2) {
    const [sx, sy] = this.scaling;
    this.eye = [
      point[0] - this.#screen.width / sx / 2,
      point[1] - this.#screen.height / sy / 2,
    ];
  }

  /**
   * Transform for world content: follows the eye and zoom.
   */
  getTransform(): Transform {
    const model = mat4.multiply(
      mat4.scaling(this.scaling),
      mat4.translation([-this.eye[0], -this.eye[1], 0]),
    );
    return {
      model,
      view: mat4.clone(this.#view),
      proj: mat4.clone(this.#proj),
    };
  }

  /**
   * Transform for UI overlays: resolution scaling only.
   */
  getScreenTransform(): Transform {
    const scale = this.resolutionScale;
    return {
      model: mat4.scaling([scale, scale, 1]),
      view: mat4.clone(this.#view),
      proj: mat4.clone(this.#proj),
    };
  }
}

export function identityTransform(): Transform {
  return {
    model: mat4.identity(),
    view: mat4.identity(),
    proj: mat4.identity(),
  };
}
