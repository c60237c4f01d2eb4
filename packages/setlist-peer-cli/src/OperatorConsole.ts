import readline from "readline";
import { SONG_FIELD_PROMPTS, opensSongForm } from "setlist-peer-protocol";

export interface OperatorHandlers {
  /** Every line that is a command. */
  onLine: (line: string) => void;
  /** The answers of a finished `create song` form, in prompt order. */
  onSong: (fields: string[]) => void;
  /** Input ended. Fires once. */
  onClose: () => void;
}

/**
 * OperatorConsole: reads commands line by line from a stream.
 *
 * A bare `create song` opens a form: the lines that follow answer its
 * questions, and only the complete set of fields is handed on. Lines that
 * were typed ahead or piped in are claimed by the form in arrival order, so
 * nothing downstream ever waits for operator input.
 */
export class OperatorConsole {
  private rl: readline.Interface | null = null;
  private form: string[] | null = null;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  start(handlers: OperatorHandlers): void {
    if (this.rl) {
      throw new Error("OperatorConsole: already started");
    }
    this.rl = readline.createInterface({ input: this.input, terminal: false });
    this.rl.on("line", (line) => this.handleLine(line, handlers));
    this.rl.on("close", () => {
      this.rl = null;
      if (this.form) {
        this.form = null;
        this.output.write("\ncreate song abandoned: input closed\n");
      }
      handlers.onClose();
    });
  }

  close(): void {
    if (this.rl) {
      this.rl.close();
    }
  }

  private handleLine(line: string, handlers: OperatorHandlers): void {
    if (this.form) {
      this.form.push(line);
      if (this.form.length < SONG_FIELD_PROMPTS.length) {
        this.output.write(SONG_FIELD_PROMPTS[this.form.length]);
        return;
      }
      const fields = this.form;
      this.form = null;
      handlers.onSong(fields);
      return;
    }
    if (opensSongForm(line)) {
      this.form = [];
      this.output.write(SONG_FIELD_PROMPTS[0]);
      return;
    }
    handlers.onLine(line);
  }
}
