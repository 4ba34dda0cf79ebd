/**
 * FFmpeg Service
 * Strips video and encodes MP3 (libmp3lame, 44.1 kHz, 128 kbps) as a subprocess.
 */

import { access } from "fs/promises";
import { execa } from "execa";
import { truncate } from "../../utils/errorMessages.js";
import { TranscodeError } from "../../utils/errors.js";

export interface CommandResult {
  exitCode: number | undefined;
  output: string;
}

export type CommandRunner = (file: string, args: string[], signal?: AbortSignal) => Promise<CommandResult>;

export interface Transcoder {
  /** Writes MP3 audio from `inputPath` to `outputPath` and returns `outputPath`. */
  transcode(inputPath: string, outputPath: string, signal?: AbortSignal): Promise<string>;
}

export interface TranscoderOptions {
  ffmpegPath?: string;
  run?: CommandRunner;
}

const MAX_OUTPUT_LENGTH = 800;

/**
 * Runs a command with stdout/stderr interleaved. Never rejects on a non-zero exit.
 */
export const runCommand: CommandRunner = async (file, args, signal) => {
  const result = await execa(file, args, {
    all: true,
    reject: false,
    cancelSignal: signal,
  });
  return { exitCode: result.exitCode, output: String(result.all ?? "").trim() };
};

export function mp3Args(inputPath: string, outputPath: string): string[] {
  return [
    "-hide_banner",
    "-loglevel", "error",
    "-y",
    "-i", inputPath,
    "-vn",
    "-acodec", "libmp3lame",
    "-ar", "44100",
    "-b:a", "128k",
    outputPath,
  ];
}

export function createTranscoder({ ffmpegPath = "ffmpeg", run = runCommand }: TranscoderOptions = {}): Transcoder {
  return {
    async transcode(inputPath, outputPath, signal) {
      console.log(`[ffmpeg] converting ${inputPath} to mp3`);
      const { exitCode, output } = await run(ffmpegPath, mp3Args(inputPath, outputPath), signal);
      signal?.throwIfAborted();

      if (exitCode !== 0) {
        const detail = truncate(output, MAX_OUTPUT_LENGTH);
        const status = exitCode === undefined ? "did not exit cleanly" : `exited with code ${exitCode}`;
        throw new TranscodeError(detail ? `ffmpeg ${status}: ${detail}` : `ffmpeg ${status}`);
      }

      try {
        await access(outputPath);
      } catch {
        throw new TranscodeError("ffmpeg produced no output file");
      }
      return outputPath;
    },
  };
}
