import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import sharp from 'sharp';
import { cropImage, readImageSize } from '../image.js';

jest.mock('sharp', () => jest.fn());

describe('image operations', () => {
  const sharpMock = sharp as unknown as jest.Mock;

  let pipeline: {
    metadata: jest.Mock;
    extract: jest.Mock;
    png: jest.Mock;
    toFile: jest.Mock;
  };

  beforeEach(() => {
    jest.clearAllMocks();
    pipeline = {
      metadata: jest.fn(() => Promise.resolve({ width: 1000, height: 700 })) as jest.Mock,
      extract: jest.fn(() => pipeline) as jest.Mock,
      png: jest.fn(() => pipeline) as jest.Mock,
      toFile: jest.fn(() => Promise.resolve({})) as jest.Mock,
    };
    sharpMock.mockImplementation(() => pipeline);
  });

  it('reads PNG dimensions', async () => {
    await expect(readImageSize('/tmp/capture.png')).resolves.toEqual({ width: 1000, height: 700 });
    expect(sharpMock).toHaveBeenCalledWith('/tmp/capture.png');
  });

  it('rejects images without dimensions', async () => {
    pipeline.metadata.mockImplementation(() => Promise.resolve({}));

    await expect(readImageSize('/tmp/broken.png')).rejects.toThrow('Could not read dimensions of /tmp/broken.png');
  });

  it('extracts the crop box and writes a PNG', async () => {
    const size = await cropImage('/tmp/capture.png', { x0: 184, y0: 84, x1: 616, y1: 316 }, '/out/diagram.png');

    expect(pipeline.extract).toHaveBeenCalledWith({ left: 184, top: 84, width: 432, height: 232 });
    expect(pipeline.png).toHaveBeenCalled();
    expect(pipeline.toFile).toHaveBeenCalledWith('/out/diagram.png');
    expect(size).toEqual({ width: 432, height: 232 });
  });
});
