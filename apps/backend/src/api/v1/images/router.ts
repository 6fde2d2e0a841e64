import { Router, type Request } from 'express';
import {
  type CreateImageBody,
  type CreateImageResponse,
  CreateImageBodySchema,
  type DeleteImageQuery,
  type DeleteImageResponse,
  DeleteImageQuerySchema,
  type DownloadImageQuery,
  type DownloadImageResponse,
  DownloadImageQuerySchema,
  type ErrorResponse,
  type GetImageResponse,
  type ImageIdParams,
  ImageIdParamsSchema,
  type ListImagesQuery,
  type ListImagesResponse,
  ListImagesQuerySchema,
  type UpdateImageDetailsBody,
  type UpdateImageDetailsResponse,
  UpdateImageDetailsBodySchema,
  type UpdateImageStatusBody,
  type UpdateImageStatusResponse,
  UpdateImageStatusBodySchema,
} from '@imagevault/api-contracts';
import type { ImageService } from '../../../services/image/ImageService.js';
import { requireUser } from '../../middleware/auth.js';
import { validateRequest } from '../../middleware/validation.js';
import { createImageHandlers } from './handlers.js';

type NoParams = Request['params'];
type NoQuery = Request['query'];

export function createImagesRouter(images: ImageService): Router {
  const router = Router();
  const handlers = createImageHandlers(images);

  router.post<NoParams, CreateImageResponse | ErrorResponse, CreateImageBody>(
    '/',
    requireUser,
    validateRequest<NoParams, NoQuery, CreateImageBody, CreateImageResponse>({
      body: CreateImageBodySchema,
    }),
    handlers.createImage
  );

  router.get<NoParams, ListImagesResponse | ErrorResponse, unknown, ListImagesQuery>(
    '/',
    requireUser,
    validateRequest<NoParams, ListImagesQuery, unknown, ListImagesResponse>({
      query: ListImagesQuerySchema,
    }),
    handlers.listImages
  );

  router.get<ImageIdParams, GetImageResponse | ErrorResponse>(
    '/:imageId',
    requireUser,
    validateRequest<ImageIdParams, NoQuery, unknown, GetImageResponse>({
      params: ImageIdParamsSchema,
    }),
    handlers.getImage
  );

  router.patch<ImageIdParams, UpdateImageStatusResponse | ErrorResponse, UpdateImageStatusBody>(
    '/:imageId',
    requireUser,
    validateRequest<ImageIdParams, NoQuery, UpdateImageStatusBody, UpdateImageStatusResponse>({
      params: ImageIdParamsSchema,
      body: UpdateImageStatusBodySchema,
    }),
    handlers.updateImageStatus
  );

  router.patch<ImageIdParams, UpdateImageDetailsResponse | ErrorResponse, UpdateImageDetailsBody>(
    '/:imageId/details',
    requireUser,
    validateRequest<ImageIdParams, NoQuery, UpdateImageDetailsBody, UpdateImageDetailsResponse>({
      params: ImageIdParamsSchema,
      body: UpdateImageDetailsBodySchema,
    }),
    handlers.updateImageDetails
  );

  router.delete<ImageIdParams, DeleteImageResponse | ErrorResponse, unknown, DeleteImageQuery>(
    '/:imageId',
    requireUser,
    validateRequest<ImageIdParams, DeleteImageQuery, unknown, DeleteImageResponse>({
      params: ImageIdParamsSchema,
      query: DeleteImageQuerySchema,
    }),
    handlers.deleteImage
  );

  router.get<ImageIdParams, DownloadImageResponse | ErrorResponse, unknown, DownloadImageQuery>(
    '/:imageId/download',
    requireUser,
    validateRequest<ImageIdParams, DownloadImageQuery, unknown, DownloadImageResponse>({
      params: ImageIdParamsSchema,
      query: DownloadImageQuerySchema,
    }),
    handlers.downloadImage
  );

  return router;
}
