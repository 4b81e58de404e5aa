import { spawn } from "node:child_process";
import type { Logger } from "pino";
import sharp from "sharp";
import { GenerationFailedError } from "../errors/catalog.js";
import { isImageName, isVideoName } from "../files/entry.js";

export interface ThumbnailSource {
  absolutePath: string;
  /** Root-relative path, used for type detection and logging. */
  relPath: string;
}

export interface ThumbnailGenerator {
  /** Renders a JPEG preview `width` pixels wide. */
  generate(source: ThumbnailSource, width: number): Promise<Uint8Array>;
}

export interface MediaGeneratorOptions {
  ffmpegPath: string;
  /** Position of the extracted video frame. */
  videoSeekSeconds: number;
  timeoutMs: number;
  logger?: Logger;
}

/** Spawns ffmpeg and collects the single frame it writes to stdout. */
export function extractVideoFrame(
  options: MediaGeneratorOptions,
  absolutePath: string,
  width: number,
  seekSeconds: number,
): Promise<Buffer> {
  const args = [
    "-hide_banner",
    "-loglevel",
    "error",
    "-ss",
    seekSeconds.toFixed(2),
    "-i",
    absolutePath,
    "-vframes",
    "1",
    "-vf",
    `scale=${width}:-1`,
    "-f",
    "image2pipe",
    "-vcodec",
    "mjpeg",
    "pipe:1",
  ];

  return new Promise<Buffer>((resolve, reject) => {
    const proc = spawn(options.ffmpegPath, args, { stdio: ["ignore", "pipe", "pipe"] });
    const out: Buffer[] = [];
    let stderr = "";

    const timer = setTimeout(() => {
      proc.kill("SIGKILL");
      reject(new GenerationFailedError("Video frame extraction timed out"));
    }, options.timeoutMs);

    proc.stdout.on("data", (chunk: Buffer) => out.push(chunk));
    proc.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    proc.on("error", (err) => {
      clearTimeout(timer);
      options.logger?.error({ err }, "Failed to start ffmpeg");
      reject(new GenerationFailedError("Video thumbnails are unavailable"));
    });
    proc.on("close", (code) => {
      clearTimeout(timer);
      if (code === 0) {
        resolve(Buffer.concat(out));
        return;
      }
      options.logger?.warn({ code, stderr: stderr.slice(-500) }, "ffmpeg failed");
      reject(new GenerationFailedError("Video frame could not be extracted"));
    });
  });
}

/**
 * Images are resized with sharp; videos get one frame from ffmpeg at
 * `videoSeekSeconds`, retried at 0s for clips shorter than that.
 */
export function createMediaThumbnailGenerator(
  options: MediaGeneratorOptions,
): ThumbnailGenerator {
  const { logger } = options;

  async function fromImage(source: ThumbnailSource, width: number): Promise<Uint8Array> {
    try {
      return await sharp(source.absolutePath)
        .rotate()
        .resize({ width, withoutEnlargement: true })
        .jpeg({ quality: 80 })
        .toBuffer();
    } catch (err) {
      logger?.warn({ err, path: source.relPath }, "Image could not be decoded");
      throw new GenerationFailedError("Image could not be decoded", { path: source.relPath });
    }
  }

  async function fromVideo(source: ThumbnailSource, width: number): Promise<Uint8Array> {
    let frame = await extractVideoFrame(options, source.absolutePath, width, options.videoSeekSeconds);
    if (frame.length === 0 && options.videoSeekSeconds > 0) {
      logger?.debug({ path: source.relPath }, "No frame at seek position, retrying at start");
      frame = await extractVideoFrame(options, source.absolutePath, width, 0);
    }
    if (frame.length === 0) {
      throw new GenerationFailedError("Video has no decodable frames", { path: source.relPath });
    }
    return frame;
  }

  return {
    async generate(source, width) {
      if (isImageName(source.relPath)) {
        return fromImage(source, width);
      }
      if (isVideoName(source.relPath)) {
        return fromVideo(source, width);
      }
      throw new GenerationFailedError("No thumbnail available for this file type", {
        path: source.relPath,
      });
    },
  };
}
