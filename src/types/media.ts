export enum ImageFormat {
  Jpeg = 'Jpeg',
  Png = 'Png',
  Gif = 'Gif',
  Bmp = 'Bmp',
  Webp = 'Webp',
  Tiff = 'Tiff'
}

// Extensions are matched case-insensitively, without the leading dot
export const SUPPORTED_IMAGE_EXTENSIONS: ReadonlyMap<string, ImageFormat> = new Map([
  ['jpg', ImageFormat.Jpeg],
  ['jpeg', ImageFormat.Jpeg],
  ['png', ImageFormat.Png],
  ['gif', ImageFormat.Gif],
  ['bmp', ImageFormat.Bmp],
  ['webp', ImageFormat.Webp],
  ['tiff', ImageFormat.Tiff],
  ['tif', ImageFormat.Tiff],
]);

/** Absolute path of one discovered image. */
export type ImageEntry = string;

/** Sorted, de-duplicated result of a single directory scan. Never mutated after the scan. */
export type ImageList = readonly ImageEntry[];

export type ImageDetails = {
  filePath: string;
  fileName: string;
  relativePath: string;
  format: ImageFormat;
  sizeBytes: number;
  dateModified: number;
}

function extensionOf(filePath: string): string {
  const fileName = filePath.split(/[\\/]/).pop() || '';
  const dot = fileName.lastIndexOf('.');
  if (dot <= 0) {
    return '';
  }
  return fileName.slice(dot + 1).toLowerCase();
}

export function determineImageFormat(filePath: string): ImageFormat | undefined {
  return SUPPORTED_IMAGE_EXTENSIONS.get(extensionOf(filePath));
}

export function isSupportedImage(filePath: string): boolean {
  return determineImageFormat(filePath) !== undefined;
}
