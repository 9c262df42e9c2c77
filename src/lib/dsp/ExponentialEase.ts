/**
 * One-pole exponential smoother: each step closes a fixed fraction of the
 * remaining distance to the target.
 */

/** Distance under which the ease snaps onto its target */
const DONE_THRESHOLD = 1e-5;

export class ExponentialEase {
  private currentValue: number;
  private targetValue: number;
  private easeFactor: number;

  constructor(initValue = 0, easeFactor = 0.001) {
    this.currentValue = initValue;
    this.targetValue = initValue;
    this.easeFactor = easeFactor;
  }

  init(value: number, easeFactor = this.easeFactor): void {
    this.currentValue = value;
    this.targetValue = value;
    this.easeFactor = easeFactor;
  }

  setEaseFactor(easeFactor: number): void {
    this.easeFactor = easeFactor;
  }

  /** Set a new target. With immediate, jump straight to it. */
  setValue(target: number, immediate = false): void {
    this.targetValue = target;
    if (immediate) this.currentValue = target;
  }

  getNextValue(): number {
    if (this.isDone()) {
      this.currentValue = this.targetValue;
      return this.currentValue;
    }
    this.currentValue += this.easeFactor * (this.targetValue - this.currentValue);
    return this.currentValue;
  }

  getValue(): number {
    return this.currentValue;
  }

  getTarget(): number {
    return this.targetValue;
  }

  isDone(): boolean {
    return Math.abs(this.targetValue - this.currentValue) < DONE_THRESHOLD;
  }
}
