import readline from "node:readline";
import { SpotkeyError } from "../errors.js";

export type KeyPress = {
  char?: string;
  name?: string;
  ctrl?: boolean;
};

export type KeySource = {
  start(listener: (key: KeyPress) => void): void;
  stop(): void;
};

export class TerminalKeySource implements KeySource {
  private readonly input: NodeJS.ReadStream;
  private handler: ((str: string | undefined, key?: readline.Key) => void) | null =
    null;

  constructor(input: NodeJS.ReadStream = process.stdin) {
    this.input = input;
  }

  start(listener: (key: KeyPress) => void) {
    if (!this.input.isTTY) {
      throw new SpotkeyError(
        "no_tty",
        "Keyboard shortcuts need an interactive terminal."
      );
    }
    readline.emitKeypressEvents(this.input);
    this.input.setRawMode(true);
    this.input.setEncoding("utf8");
    this.input.resume();
    this.handler = (str, key) => {
      listener({ char: str, name: key?.name, ctrl: key?.ctrl });
    };
    this.input.on("keypress", this.handler);
  }

  stop() {
    if (!this.handler) {
      return;
    }
    this.input.off("keypress", this.handler);
    this.handler = null;
    this.input.setRawMode(false);
    this.input.pause();
  }
}
