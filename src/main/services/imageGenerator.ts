import fs from 'fs/promises';
import path from 'path';
import log from 'electron-log/node';
import type OpenAI from 'openai';
import type { ImageQuality, ImageSize } from '../../shared/settingsTypes';

export interface ImageGenerator {
  /** Resolves with the written PNG path, or `null` when generation failed. */
  generateImage(prompt: string, name: string): Promise<string | null>;
}

export interface OpenAiImageGeneratorOptions {
  model: string;
  size: ImageSize;
  quality: ImageQuality;
  outputDir: string;
}

export function imageFileName(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return `${slug || 'image'}.png`;
}

export class OpenAiImageGenerator implements ImageGenerator {
  private readonly client: OpenAI;

  private readonly options: OpenAiImageGeneratorOptions;

  constructor(client: OpenAI, options: OpenAiImageGeneratorOptions) {
    this.client = client;
    this.options = options;
  }

  async generateImage(prompt: string, name: string): Promise<string | null> {
    log.info(`[ImageGenerator] Generating image: ${prompt.slice(0, 50)}...`);
    try {
      const response = await this.client.images.generate({
        model: this.options.model,
        prompt,
        size: this.options.size,
        quality: this.options.quality,
        n: 1,
        response_format: 'b64_json',
      });
      const encoded = response.data?.[0]?.b64_json;
      if (!encoded) {
        throw new Error('Image response carried no data');
      }

      await fs.mkdir(this.options.outputDir, { recursive: true });
      const imagePath = path.join(this.options.outputDir, imageFileName(name));
      await fs.writeFile(imagePath, Buffer.from(encoded, 'base64'));
      log.info(`[ImageGenerator] Image saved: ${imagePath}`);
      return imagePath;
    } catch (error) {
      log.error(
        `[ImageGenerator] Image generation failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }
}
