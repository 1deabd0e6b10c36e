import { mkdir } from 'fs/promises';
import { join } from 'path';

export const MODEL_FILENAME = 'model.glb';
export const PREVIEW_FILENAME = 'preview.webp';

const productSegments = (productId: string) => ['3d', 'products', productId];

export const productAssetDir = (staticRoot: string, productId: string) =>
  join(staticRoot, ...productSegments(productId));

/** Path the web server exposes the model under. */
export const productModelUrl = (productId: string) =>
  `/${[...productSegments(productId), MODEL_FILENAME].join('/')}`;

export const productPreviewUrl = (productId: string) =>
  `/${[...productSegments(productId), PREVIEW_FILENAME].join('/')}`;

export const ensureProductAssetDir = async (staticRoot: string, productId: string) => {
  const dir = productAssetDir(staticRoot, productId);
  await mkdir(dir, { recursive: true });
  return dir;
};
