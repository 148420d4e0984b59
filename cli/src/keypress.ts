import { emitKeypressEvents } from "node:readline";

export type KeypressInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export interface Keypress {
  sequence: string;
  name?: string;
  ctrl: boolean;
}

interface KeyDetails {
  sequence?: string;
  name?: string;
  ctrl?: boolean;
}

export function isInterrupt(key: Keypress): boolean {
  return key.sequence === "\u0003" || (key.ctrl && key.name === "c");
}

function isLineEnd(key: Keypress): boolean {
  return key.name === "return" || key.name === "enter";
}

/**
 * Single reader for both stepping key presses and loop-mode input lines.
 *
 * Every character decoded from `input` is queued as a key press, so a line
 * typed after a run never picks up keys that were meant for stepping and no
 * key is lost between waits. The stream is paused whenever nobody is waiting.
 */
export class KeyReader {
  private readonly input: KeypressInput;
  private readonly queue: Keypress[] = [];
  private waiter: ((key: Keypress | null) => void) | null = null;
  private started = false;
  private ended = false;
  private previousKey: Keypress | null = null;

  constructor(input: KeypressInput) {
    this.input = input;
  }

  /**
   * Next key press. A TTY is switched to raw mode for the wait so no Enter is
   * needed. Resolves `null` once the stream has ended and the queue is empty.
   */
  readKey(): Promise<Keypress | null> {
    return this.take(true);
  }

  /**
   * Next line without its terminator. `\r\n` counts as one line end. Resolves
   * `null` at end of input unless a partial line is pending.
   */
  async readLine(): Promise<string | null> {
    let line = "";

    for (;;) {
      const afterReturn = this.previousKey?.name === "return";
      const key = await this.take(false);
      if (key === null) {
        return line.length > 0 ? line : null;
      }
      if (key.name === "enter" && afterReturn && line.length === 0) {
        continue;
      }
      if (isLineEnd(key)) {
        return line;
      }
      line += key.sequence;
    }
  }

  close(): void {
    if (!this.started) {
      return;
    }

    this.input.removeListener("keypress", this.onKeypress);
    this.input.removeListener("end", this.onEnd);
    this.input.pause();
    this.started = false;

    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(null);
  }

  private take(raw: boolean): Promise<Keypress | null> {
    this.start();

    const queued = this.queue.shift();
    if (queued !== undefined) {
      this.previousKey = queued;
      return Promise.resolve(queued);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }

    const rawMode = raw && this.input.isTTY === true && typeof this.input.setRawMode === "function";
    if (rawMode) {
      this.input.setRawMode?.(true);
    }

    return new Promise((resolve) => {
      this.waiter = (key) => {
        if (rawMode) {
          this.input.setRawMode?.(false);
        }
        this.input.pause();
        this.previousKey = key;
        resolve(key);
      };
      this.input.resume();
    });
  }

  private start(): void {
    if (this.started) {
      return;
    }

    emitKeypressEvents(this.input);
    this.input.on("keypress", this.onKeypress);
    this.input.once("end", this.onEnd);
    this.started = true;
  }

  private readonly onKeypress = (sequence: string | undefined, details: KeyDetails | undefined): void => {
    const key: Keypress = {
      sequence: sequence ?? details?.sequence ?? "",
      name: details?.name,
      ctrl: details?.ctrl === true
    };

    const waiter = this.waiter;
    if (waiter === null) {
      this.queue.push(key);
      return;
    }

    this.waiter = null;
    waiter(key);
  };

  private readonly onEnd = (): void => {
    this.ended = true;

    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(null);
  };
}
