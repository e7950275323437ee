import { describe, expect, it } from 'vitest';
import { ImageFormat, determineImageFormat, isSupportedImage } from './media.js';

describe('determineImageFormat', () => {
  it('maps every supported extension regardless of case', () => {
    expect(determineImageFormat('a.jpg')).toBe(ImageFormat.Jpeg);
    expect(determineImageFormat('a.JPEG')).toBe(ImageFormat.Jpeg);
    expect(determineImageFormat('dir/a.Tif')).toBe(ImageFormat.Tiff);
    expect(determineImageFormat('a.tiff')).toBe(ImageFormat.Tiff);
    expect(determineImageFormat('a.webp')).toBe(ImageFormat.Webp);
    expect(determineImageFormat('a.bmp')).toBe(ImageFormat.Bmp);
    expect(determineImageFormat('a.gif')).toBe(ImageFormat.Gif);
    expect(determineImageFormat('a.png')).toBe(ImageFormat.Png);
  });

  it('rejects other files', () => {
    expect(isSupportedImage('a.txt')).toBe(false);
    expect(isSupportedImage('jpg')).toBe(false);
    expect(isSupportedImage('.jpg')).toBe(false);
    expect(isSupportedImage('a.constructor')).toBe(false);
    expect(isSupportedImage('album.jpg/')).toBe(false);
  });
});
