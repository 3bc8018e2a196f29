import { Coordinates } from '@stepforge/shared';
import { CoordinateRangeError } from '../errors/translation.errors';

export interface CoordinateScalerOptions {
  sourceWidth: number;
  sourceHeight: number;
  targetWidth: number;
  targetHeight: number;
  originX?: number;
  originY?: number;
}

export interface ScaleOptions {
  clamp?: boolean;
  // Pull points on the outermost pixel border one pixel inward; input drivers
  // abort when the pointer reaches a literal screen corner.
  preventCornerLock?: boolean;
  strict?: boolean;
}

/**
 * Linear remap from a model's coordinate space onto a target display.
 *
 * Source extents are fixed for the lifetime of the scaler; target size and
 * origin can be changed in place when the active display changes.
 */
export class CoordinateScaler {
  readonly sourceWidth: number;
  readonly sourceHeight: number;
  private _targetWidth: number;
  private _targetHeight: number;
  private _originX: number;
  private _originY: number;
  private _scaleX: number;
  private _scaleY: number;

  constructor(options: CoordinateScalerOptions) {
    if (options.sourceWidth <= 0 || options.sourceHeight <= 0) {
      throw new RangeError('Source extents must be positive');
    }
    this.sourceWidth = options.sourceWidth;
    this.sourceHeight = options.sourceHeight;
    this._originX = options.originX ?? 0;
    this._originY = options.originY ?? 0;
    this._targetWidth = options.targetWidth;
    this._targetHeight = options.targetHeight;
    this._scaleX = 0;
    this._scaleY = 0;
    this.setTargetSize(options.targetWidth, options.targetHeight);
  }

  get targetWidth(): number {
    return this._targetWidth;
  }

  get targetHeight(): number {
    return this._targetHeight;
  }

  get scaleX(): number {
    return this._scaleX;
  }

  get scaleY(): number {
    return this._scaleY;
  }

  get origin(): Coordinates {
    return { x: this._originX, y: this._originY };
  }

  setTargetSize(width: number, height: number): void {
    if (width <= 0 || height <= 0) {
      throw new RangeError(
        `Target size must be positive, got ${width}x${height}`,
      );
    }
    this._targetWidth = width;
    this._targetHeight = height;
    this._scaleX = width / this.sourceWidth;
    this._scaleY = height / this.sourceHeight;
  }

  setOrigin(x: number, y: number): void {
    this._originX = x;
    this._originY = y;
  }

  /**
   * Centre of the target surface, relative to the target's own origin.
   */
  center(): Coordinates {
    return {
      x: Math.floor(this._targetWidth / 2),
      y: Math.floor(this._targetHeight / 2),
    };
  }

  scale(x: number, y: number, options: ScaleOptions = {}): Coordinates {
    const { clamp = true, preventCornerLock = false, strict = false } =
      options;

    if (strict) {
      if (!(x >= 0 && x <= this.sourceWidth)) {
        throw new CoordinateRangeError('x', x, this.sourceWidth);
      }
      if (!(y >= 0 && y <= this.sourceHeight)) {
        throw new CoordinateRangeError('y', y, this.sourceHeight);
      }
    }

    let scaledX = Math.round(x * this._scaleX);
    let scaledY = Math.round(y * this._scaleY);

    const maxX = this._targetWidth - 1;
    const maxY = this._targetHeight - 1;

    if (clamp) {
      scaledX = Math.max(0, Math.min(scaledX, maxX));
      scaledY = Math.max(0, Math.min(scaledY, maxY));
    }

    if (preventCornerLock) {
      scaledX = nudgeInward(scaledX, maxX);
      scaledY = nudgeInward(scaledY, maxY);
    }

    return { x: scaledX + this._originX, y: scaledY + this._originY };
  }
}

function nudgeInward(value: number, max: number): number {
  if (max < 2) {
    return value;
  }
  if (value <= 0) {
    return 1;
  }
  if (value >= max) {
    return max - 1;
  }
  return value;
}
