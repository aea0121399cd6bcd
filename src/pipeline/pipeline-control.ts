type ControlState = { paused: boolean; cancelled: boolean };
type Listener = (state: ControlState) => void;

export interface PauseSignal {
  waitIfPaused(): Promise<void>;
  readonly paused: boolean;
  readonly cancelled: boolean;
  onChange(listener: Listener): () => void;
}

export class PipelineControl implements PauseSignal {
  private _paused = false;
  private _cancelled = false;
  private waiters: Array<() => void> = [];
  private listeners = new Set<Listener>();

  get paused(): boolean {
    return this._paused;
  }

  get cancelled(): boolean {
    return this._cancelled;
  }

  pause(): void {
    if (this._paused || this._cancelled) {
      return;
    }
    this._paused = true;
    this.emit();
  }

  resume(): void {
    if (!this._paused) {
      return;
    }
    this._paused = false;
    this.releaseWaiters();
    this.emit();
  }

  cancel(): void {
    if (this._cancelled) {
      return;
    }
    this._cancelled = true;
    this._paused = false;
    this.releaseWaiters();
    this.emit();
  }

  reset(): void {
    this._paused = false;
    this._cancelled = false;
    this.releaseWaiters();
  }

  async waitIfPaused(): Promise<void> {
    if (!this._paused) {
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  onChange(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private releaseWaiters(): void {
    const waiters = [...this.waiters];
    this.waiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private emit(): void {
    for (const listener of this.listeners) {
      listener({ paused: this._paused, cancelled: this._cancelled });
    }
  }
}
