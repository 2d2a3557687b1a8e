import { stdin, stdout } from "node:process";
import { createInterface, type Interface } from "node:readline/promises";
import type { Readable, Writable } from "node:stream";
import type { IPrompter } from "../../core/domain/services/operator.service.js";

/** stdin, or any stream standing in for it. */
export type PromptInput = Readable & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

export class ReadlinePrompter implements IPrompter {
  private rl: Interface | null = null;
  private lines: AsyncIterator<string> | null = null;

  constructor(
    private input: PromptInput = stdin,
    private output: Writable = stdout,
  ) {}

  async ask(question: string, fallback = ""): Promise<string> {
    const suffix = fallback ? ` [${fallback}]` : "";
    const prompt = `${question}${suffix}: `;
    const answer = this.input.isTTY
      ? await this.interface().question(prompt)
      : await this.nextLine(prompt);
    return answer.trim() ? answer.trim() : fallback;
  }

  /**
   * Reads a secret in raw mode, echoing asterisks.
   * Falls back to a plain line read when the input is not a terminal (piped input).
   */
  async askSecret(question: string): Promise<string> {
    const { input, output } = this;
    if (!input.isTTY || !input.setRawMode) return this.ask(question);
    const setRaw = (mode: boolean) => input.setRawMode?.(mode);
    this.close();
    return new Promise<string>((resolve) => {
      output.write(`${question}: `);
      setRaw(true);
      let value = "";
      const finish = (answer: string) => {
        setRaw(false);
        input.removeListener("data", onData);
        input.pause();
        output.write("\n");
        resolve(answer);
      };
      const onData = (key: Buffer) => {
        for (const ch of key.toString()) {
          if (ch === "\n" || ch === "\r") {
            finish(value);
            return;
          } else if (ch === "\u0003") {
            setRaw(false);
            process.exit(130);
          } else if (ch === "\u007f" || ch === "\b") {
            if (value.length > 0) {
              value = value.slice(0, -1);
              output.write("\b \b");
            }
          } else {
            value += ch;
            output.write("*");
          }
        }
      };
      input.resume();
      input.on("data", onData);
    });
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
    this.lines = null;
  }

  /**
   * Piped answers come from one line iterator, which queues lines that
   * arrive before the next question is asked. End of input answers "".
   */
  private async nextLine(prompt: string): Promise<string> {
    this.output.write(prompt);
    if (!this.lines) this.lines = this.interface()[Symbol.asyncIterator]();
    const next = await this.lines.next();
    this.output.write("\n");
    return next.done ? "" : next.value;
  }

  private interface(): Interface {
    if (!this.rl) {
      this.rl = this.input.isTTY
        ? createInterface({ input: this.input, output: this.output })
        : createInterface({ input: this.input, terminal: false });
    }
    return this.rl;
  }
}
