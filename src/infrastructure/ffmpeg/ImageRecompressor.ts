import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs/promises';
import path from 'path';
import { config } from '../../config/env';
import { createLogger } from '../../utils/logger';
import { FFmpegError } from '../../utils/errors';

const logger = createLogger('ImageRecompressor');

// Set FFmpeg paths
ffmpeg.setFfmpegPath(config.ffmpeg.path);
ffmpeg.setFfprobePath(config.ffmpeg.probePath);

export interface ImageDimensions {
  width: number;
  height: number;
}

export interface ImageRecompressorOptions {
  tempDir?: string;
}

/**
 * Lossy size reduction of PNG logos: re-encodes to a palette-indexed PNG with
 * maximum compression. Work files live in a per-call temporary directory.
 */
export class ImageRecompressor {
  private readonly tempDir: string;

  constructor(options: ImageRecompressorOptions = {}) {
    this.tempDir = options.tempDir ?? config.paths.temp;
  }

  /**
   * Returns the palette PNG together with the dimensions ffprobe reports for it
   */
  public async recompress(image: Buffer, name: string): Promise<{ data: Buffer; dimensions: ImageDimensions }> {
    await fs.mkdir(this.tempDir, { recursive: true });
    const workDir = await fs.mkdtemp(path.join(this.tempDir, 'logo-'));
    const inputPath = path.join(workDir, 'input.png');
    const outputPath = path.join(workDir, 'output.png');

    try {
      await fs.writeFile(inputPath, image);
      await this.convert(inputPath, outputPath);
      const data = await fs.readFile(outputPath);
      const dimensions = await this.probe(outputPath);
      logger.debug(
        { name, originalBytes: image.length, recompressedBytes: data.length },
        'Recompressed logo to palette PNG'
      );
      return { data, dimensions };
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  /**
   * Dimensions of an image held in memory
   */
  public async dimensions(image: Buffer): Promise<ImageDimensions> {
    await fs.mkdir(this.tempDir, { recursive: true });
    const workDir = await fs.mkdtemp(path.join(this.tempDir, 'probe-'));
    const imagePath = path.join(workDir, 'image.png');
    try {
      await fs.writeFile(imagePath, image);
      return await this.probe(imagePath);
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  private convert(inputPath: string, outputPath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      ffmpeg(inputPath)
        .outputOptions([
          '-filter_complex', 'split[a][b];[a]palettegen=reserve_transparent=1[p];[b][p]paletteuse',
          '-pix_fmt', 'pal8',
          '-compression_level', '100',
          '-frames:v', '1',
        ])
        .output(outputPath)
        .on('end', () => resolve())
        .on('error', (err: Error) => {
          reject(new FFmpegError(`Palette conversion failed: ${err.message}`));
        })
        .run();
    });
  }

  /**
   * Probe file using ffprobe
   */
  private probe(filePath: string): Promise<ImageDimensions> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(filePath, (err, metadata) => {
        if (err) {
          reject(new FFmpegError(`Failed to probe image: ${err}`));
          return;
        }
        const stream = metadata.streams.find((s) => s.codec_type === 'video');
        if (!stream || !stream.width || !stream.height) {
          reject(new FFmpegError('Image has no video stream'));
          return;
        }
        resolve({ width: stream.width, height: stream.height });
      });
    });
  }
}
