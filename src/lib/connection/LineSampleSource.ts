import { createInterface, type Interface } from "node:readline";
import type { Readable } from "node:stream";
import { parseQuaternionLine } from "../parsers/quaternionLineParser";
import { sourceLog } from "../logger";
import type { QuaternionSample } from "../motion/types";

const DEFAULT_MAX_PENDING_SAMPLES = 256;
const PENDING_COMPACT_THRESHOLD = 64;

export interface SampleSource {
  /** Next sample, or null when none has arrived. Never blocks. */
  poll(): QuaternionSample | null;
}

export interface LineSourceStats {
  linesSeen: number;
  samplesParsed: number;
  linesRejected: number;
  samplesDropped: number;
  pending: number;
}

/**
 * Turns a stream of text lines into a pollable queue of quaternion samples.
 *
 * Transports push raw lines in; the driver pulls at most one sample per tick.
 * For live pushes (serial), a consumer that falls behind loses the oldest
 * samples so the cursor tracks current motion rather than a backlog.
 * Attached streams are paused instead, so a replayed capture loses nothing.
 */
export class LineSampleSource implements SampleSource {
  private pending: QuaternionSample[] = [];
  private pendingStart = 0;
  private readonly maxPending: number;
  private dropWarned = false;
  private readonly readers = new Set<Interface>();
  private readersPaused = false;

  private stats = {
    linesSeen: 0,
    samplesParsed: 0,
    linesRejected: 0,
    samplesDropped: 0,
  };

  constructor(maxPending: number = DEFAULT_MAX_PENDING_SAMPLES) {
    this.maxPending = Math.max(1, Math.floor(maxPending));
  }

  pushLine(line: string): void {
    const sample = this.parse(line);
    if (!sample) return;

    if (this.pendingCount() >= this.maxPending) {
      this.pendingStart++;
      this.stats.samplesDropped++;
      if (!this.dropWarned) {
        this.dropWarned = true;
        sourceLog.warn(
          `Sample queue full (${this.maxPending}), dropping oldest samples`,
        );
      }
    }

    this.pending.push(sample);
    this.compact();
  }

  private parse(line: string): QuaternionSample | null {
    this.stats.linesSeen++;

    const sample = parseQuaternionLine(line);
    if (!sample) {
      this.stats.linesRejected++;
      return null;
    }
    this.stats.samplesParsed++;
    return sample;
  }

  /** Queue a sample from an attached stream; pause readers instead of dropping */
  private pushStreamLine(line: string): void {
    const sample = this.parse(line);
    if (!sample) return;

    this.pending.push(sample);
    this.compact();

    // readline may still emit the rest of the current chunk after pause()
    if (!this.readersPaused && this.pendingCount() >= this.maxPending) {
      this.readersPaused = true;
      for (const reader of this.readers) reader.pause();
    }
  }

  poll(): QuaternionSample | null {
    if (this.pendingCount() === 0) return null;

    const sample = this.pending[this.pendingStart];
    this.pendingStart++;
    this.compact();

    if (this.pendingCount() === 0) {
      this.dropWarned = false;
    }
    if (this.pendingCount() <= this.maxPending / 2) {
      this.resumeReaders();
    }

    return sample;
  }

  /**
   * Feed every line of a readable stream (stdin, a recorded file) into this
   * source. Reading pauses while the queue is full. Returns a function that
   * stops reading.
   */
  attachStream(input: Readable): () => void {
    const rl = createInterface({ input, crlfDelay: Infinity });
    this.readers.add(rl);
    if (this.readersPaused) rl.pause();

    rl.on("line", (line) => this.pushStreamLine(line));
    rl.on("close", () => {
      this.readers.delete(rl);
      sourceLog.info("Input stream closed");
    });
    return () => rl.close();
  }

  clear(): void {
    this.pending = [];
    this.pendingStart = 0;
    this.dropWarned = false;
    this.resumeReaders();
  }

  getStats(): LineSourceStats {
    return { ...this.stats, pending: this.pendingCount() };
  }

  private resumeReaders(): void {
    if (!this.readersPaused) return;
    this.readersPaused = false;
    for (const reader of this.readers) reader.resume();
  }

  private compact(): void {
    if (this.pendingStart >= PENDING_COMPACT_THRESHOLD) {
      this.pending = this.pending.slice(this.pendingStart);
      this.pendingStart = 0;
    }
  }

  private pendingCount(): number {
    return this.pending.length - this.pendingStart;
  }
}
