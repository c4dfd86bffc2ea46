/**
 * Advances a playback frame index at a target frames-per-second rate,
 * independent of the display frame rate. At the last frame it either wraps
 * (loop) or pauses.
 */
export class PlaybackStepper {
  framesPerSecond = 2;
  paused = false;
  loop = false;

  private accumulator = 0;
  private index = 0;
  private count: number;

  constructor(frameCount: number) {
    this.count = Math.max(0, frameCount);
  }

  get frameIndex(): number {
    return this.index;
  }

  get frameCount(): number {
    return this.count;
  }

  /** Jumps to a frame (clamped to the valid range) and clears any fractional progress. */
  seek(index: number): void {
    this.index = this.count > 0 ? Math.max(0, Math.min(index, this.count - 1)) : 0;
    this.accumulator = 0;
  }

  /** Replaces the timeline length, keeping the current frame where possible. */
  reset(frameCount: number): void {
    this.count = Math.max(0, frameCount);
    this.seek(this.index);
  }

  /**
   * Called once per display frame with the milliseconds since the previous one.
   * Returns true if the frame index changed.
   */
  advance(deltaMs: number): boolean {
    if (this.paused || this.count === 0) return false;

    const deltaSeconds = deltaMs / 1000;
    if (deltaSeconds <= 0) return false;

    this.accumulator += this.framesPerSecond * deltaSeconds;
    const steps = Math.floor(this.accumulator);
    this.accumulator -= steps;

    const before = this.index;
    for (let i = 0; i < steps; i++) {
      if (this.index < this.count - 1) {
        this.index++;
      } else if (this.loop) {
        this.index = 0;
      } else {
        this.paused = true;
        this.accumulator = 0;
        break;
      }
    }
    return this.index !== before;
  }
}
