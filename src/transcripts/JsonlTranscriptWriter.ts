// Daily JSONL transcript files

import fs from "fs/promises";
import path from "path";
import { createLogger, type LayerLogger, type Logger } from "../utils/logger.js";
import type { TranscriptRecord, TranscriptWriter } from "./types.js";

/**
 * Appends one JSON line per finished conversation to
 * `<dir>/transcripts-YYYY-MM-DD.jsonl`, dated by the record's end time.
 */
export class JsonlTranscriptWriter implements TranscriptWriter {
  private dirReady = false;
  private logger: LayerLogger;

  constructor(
    private dir: string,
    logger?: Logger
  ) {
    this.logger = (logger ?? createLogger()).forLayer("transcript");
  }

  async writeConversation(record: TranscriptRecord): Promise<void> {
    if (!this.dirReady) {
      await fs.mkdir(this.dir, { recursive: true });
      this.dirReady = true;
    }

    const filePath = this.filePathFor(new Date(record.ended_at));
    await fs.appendFile(filePath, JSON.stringify(record) + "\n", "utf-8");
    this.logger.debug(`Transcript for ${record.session_id} appended to ${filePath}`);
  }

  filePathFor(date: Date): string {
    const day = date.toISOString().split("T")[0];
    return path.join(this.dir, `transcripts-${day}.jsonl`);
  }
}
