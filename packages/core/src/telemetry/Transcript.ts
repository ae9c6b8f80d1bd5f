import { once } from 'node:events';
import { createWriteStream, existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { TranscriptError, describeError } from '../errors.js';

/** Options for configuring transcript logging. */
export type TranscriptOptions = {
  /** Directory to write transcript artifacts into */
  logDir: string;
  /** File name for the JSONL transcript (default: transcript.jsonl) */
  fileName?: string;
};

/** Single JSONL record written to the transcript. */
export type TranscriptRecord = {
  /** Milliseconds since epoch */
  ts: number;
  /** Record type label */
  type: 'request' | 'response' | 'error';
  /** Model the request was sent to */
  model?: string;
  /** Prompt as sent, after hinting and truncation */
  prompt?: string;
  /** Answer text, if any */
  text?: string;
  /** Error message, if any */
  error?: string;
};

/** Append-only JSONL transcript of request/response exchanges. */
export class Transcript {
  private readonly stream: ReturnType<typeof createWriteStream>;
  private failure: unknown;
  public readonly filePath: string;

  /**
   * Create or append to a JSONL transcript in the provided directory.
   * Resolves once the file is open; rejects with {@link TranscriptError}
   * when the directory or file cannot be used.
   */
  public static async open(options: TranscriptOptions): Promise<Transcript> {
    const filePath = join(options.logDir, options.fileName ?? 'transcript.jsonl');
    let transcript: Transcript;
    try {
      transcript = new Transcript(options.logDir, filePath);
      await once(transcript.stream, 'open');
    } catch (err) {
      throw new TranscriptError(`cannot open ${filePath}: ${describeError(err)}`, { cause: err });
    }
    return transcript;
  }

  private constructor(logDir: string, filePath: string) {
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    this.filePath = filePath;
    this.stream = createWriteStream(filePath, { flags: 'a' });
    this.stream.on('error', (err) => {
      this.failure ??= err;
    });
  }

  /** Append a record to the transcript as a single JSON line. */
  public write(record: TranscriptRecord): void {
    if (this.failure !== undefined) return;
    const line = JSON.stringify(record);
    this.stream.write(`${line}\n`);
  }

  /** Flush and close the underlying stream, reporting any earlier write failure. */
  public async close(): Promise<void> {
    if (!this.stream.destroyed) {
      await new Promise<void>((resolve) => {
        this.stream.end(() => resolve());
      });
    }
    if (this.failure !== undefined) {
      throw new TranscriptError(`cannot write ${this.filePath}: ${describeError(this.failure)}`, {
        cause: this.failure,
      });
    }
  }
}
