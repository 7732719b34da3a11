// src/core/export/image.ts
import sharp from 'sharp';
import * as fs from 'fs/promises';
import { cropBoxSize } from './crop.js';
import type { CropBox, ImageSize } from '../types/index.js';

export async function readImageSize(imagePath: string): Promise<ImageSize> {
  const { width, height } = await sharp(imagePath).metadata();
  if (!width || !height) {
    throw new Error(`Could not read dimensions of ${imagePath}`);
  }
  return { width, height };
}

export async function cropImage(sourcePath: string, box: CropBox, outputPath: string): Promise<ImageSize> {
  const { width, height } = cropBoxSize(box);
  await sharp(sourcePath)
    .extract({ left: box.x0, top: box.y0, width, height })
    .png()
    .toFile(outputPath);
  return { width, height };
}

export async function copyImage(sourcePath: string, outputPath: string): Promise<void> {
  await fs.copyFile(sourcePath, outputPath);
}
