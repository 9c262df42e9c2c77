/**
 * Trigger events of one block as sorted frame indices.
 * Events are block-scoped: advanceBlock() drops everything from the last block.
 */

export type FrameRangeCallback = (startFrame: number, endFrame: number) => void;

export class TriggerStream {
  private readonly triggered: number[] = [];

  constructor(readonly blockSize: number) {}

  /** Start a new block, clearing the previous block's events. */
  advanceBlock(): void {
    this.triggered.length = 0;
  }

  /**
   * Record a trigger at a frame of the current block.
   * Frames outside [0, blockSize), non-integers and duplicates are ignored;
   * out-of-order frames are inserted in place.
   */
  triggerFrame(frame: number): void {
    if (!Number.isInteger(frame) || frame < 0 || frame >= this.blockSize) return;
    let i = this.triggered.length;
    while (i > 0 && this.triggered[i - 1] > frame) i--;
    if (i > 0 && this.triggered[i - 1] === frame) return;
    if (i === this.triggered.length) this.triggered.push(frame);
    else this.triggered.splice(i, 0, frame);
  }

  /**
   * Replace this block's events with an input frame list.
   * Entries that are out of range or not strictly increasing are dropped.
   */
  load(frames: readonly number[]): void {
    this.triggered.length = 0;
    let last = -1;
    for (const frame of frames) {
      if (!Number.isInteger(frame) || frame <= last || frame >= this.blockSize) continue;
      this.triggered.push(frame);
      last = frame;
    }
  }

  get frames(): readonly number[] {
    return this.triggered;
  }

  isTriggered(): boolean {
    return this.triggered.length > 0;
  }

  /**
   * Walk the block as sub-ranges split at each trigger.
   * onPreTrigger covers any leading range with no trigger at its start
   * (the whole block when nothing fired); onTrigger runs once per trigger
   * for the range up to the next trigger or the block end.
   */
  executeBlock(onPreTrigger: FrameRangeCallback, onTrigger: FrameRangeCallback): void {
    const count = this.triggered.length;
    if (count === 0) {
      onPreTrigger(0, this.blockSize);
      return;
    }

    if (this.triggered[0] > 0) {
      onPreTrigger(0, this.triggered[0]);
    }

    for (let i = 0; i < count; i++) {
      const end = i + 1 < count ? this.triggered[i + 1] : this.blockSize;
      onTrigger(this.triggered[i], end);
    }
  }
}
