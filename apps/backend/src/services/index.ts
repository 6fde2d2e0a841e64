import type { AppConfig } from '../config/env.js';
import type { RepositoryContext } from '../repositories/types.js';
import type { ImageObjectStorage } from '../storage/types.js';
import { ImageService } from './image/ImageService.js';

export type ServiceContext = {
  images: ImageService;
};

export function createServiceContext(
  repos: RepositoryContext,
  storage: ImageObjectStorage,
  config: AppConfig
): ServiceContext {
  return {
    images: new ImageService({
      repo: repos.images,
      storage,
      config: {
        maxImageSize: config.images.maxImageSize,
        allowedContentTypes: config.images.allowedContentTypes,
        defaultUrlExpirySeconds: config.s3.presignedUrlExpirySeconds,
      },
    }),
  };
}
