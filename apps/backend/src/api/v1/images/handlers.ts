import type { NextFunction, Request, Response } from 'express';
import type {
  CreateImageBody,
  CreateImageResponse,
  DeleteImageQuery,
  DeleteImageResponse,
  DownloadImageQuery,
  DownloadImageResponse,
  ErrorResponse,
  GetImageResponse,
  ImageIdParams,
  ListImagesQuery,
  ListImagesResponse,
  UpdateImageDetailsBody,
  UpdateImageDetailsResponse,
  UpdateImageStatusBody,
  UpdateImageStatusResponse,
} from '@imagevault/api-contracts';
import { parseTagList } from '@imagevault/shared';
import type { ImageService } from '../../../services/image/ImageService.js';
import { callerId } from '../../middleware/auth.js';
import { toImageListItem, toImageMetadataDto, toUploadTicketDto } from './mappers.js';

type NoParams = Request['params'];

export type ImageHandlers = ReturnType<typeof createImageHandlers>;

export function createImageHandlers(images: ImageService) {
  async function createImage(
    req: Request<NoParams, CreateImageResponse | ErrorResponse, CreateImageBody>,
    res: Response<CreateImageResponse | ErrorResponse>,
    next: NextFunction
  ) {
    try {
      const ticket = await images.createUpload(callerId(req), req.body);
      const response: CreateImageResponse = {
        success: true,
        message: 'Upload URL generated. Upload the file with a PUT request to uploadUrl.',
        data: toUploadTicketDto(ticket),
      };
      res.status(201).json(response);
    } catch (error) {
      next(error);
    }
  }

  async function listImages(
    req: Request<NoParams, ListImagesResponse | ErrorResponse, unknown, ListImagesQuery>,
    res: Response<ListImagesResponse | ErrorResponse>,
    next: NextFunction
  ) {
    try {
      const { limit, nextToken, status, tags, contentType, minSize, maxSize } = req.query;
      const parsedTags = tags ? parseTagList(tags) : undefined;

      const page = await images.listImages(callerId(req), {
        limit,
        pageToken: nextToken,
        status,
        tags: parsedTags && parsedTags.length > 0 ? parsedTags : undefined,
        contentType,
        minSize,
        maxSize,
      });

      const response: ListImagesResponse = {
        success: true,
        data: {
          items: page.items.map(toImageListItem),
          count: page.count,
          nextToken: page.nextToken,
          hasMore: page.hasMore,
        },
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  }

  async function getImage(
    req: Request<ImageIdParams, GetImageResponse | ErrorResponse>,
    res: Response<GetImageResponse | ErrorResponse>,
    next: NextFunction
  ) {
    try {
      const image = await images.getImage(callerId(req), req.params.imageId);
      const response: GetImageResponse = {
        success: true,
        data: toImageMetadataDto(image),
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  }

  async function updateImageStatus(
    req: Request<ImageIdParams, UpdateImageStatusResponse | ErrorResponse, UpdateImageStatusBody>,
    res: Response<UpdateImageStatusResponse | ErrorResponse>,
    next: NextFunction
  ) {
    try {
      const result = await images.updateStatus(callerId(req), req.params.imageId, req.body);
      const response: UpdateImageStatusResponse = {
        success: true,
        message: `Image status updated to ${result.status}`,
        data: result,
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  }

  async function updateImageDetails(
    req: Request<ImageIdParams, UpdateImageDetailsResponse | ErrorResponse, UpdateImageDetailsBody>,
    res: Response<UpdateImageDetailsResponse | ErrorResponse>,
    next: NextFunction
  ) {
    try {
      const image = await images.updateDetails(callerId(req), req.params.imageId, req.body);
      const response: UpdateImageDetailsResponse = {
        success: true,
        data: toImageMetadataDto(image),
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  }

  async function deleteImage(
    req: Request<ImageIdParams, DeleteImageResponse | ErrorResponse, unknown, DeleteImageQuery>,
    res: Response<DeleteImageResponse | ErrorResponse>,
    next: NextFunction
  ) {
    try {
      const result = await images.deleteImage(callerId(req), req.params.imageId, { hard: req.query.hardDelete });
      const response: DeleteImageResponse = {
        success: true,
        message: result.deleteType === 'hard' ? 'Image permanently deleted' : 'Image marked as deleted',
        data: result,
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  }

  async function downloadImage(
    req: Request<ImageIdParams, DownloadImageResponse | ErrorResponse, unknown, DownloadImageQuery>,
    res: Response<DownloadImageResponse | ErrorResponse>,
    next: NextFunction
  ) {
    try {
      const { expiry, redirect } = req.query;
      const ticket = await images.getDownloadUrl(callerId(req), req.params.imageId, { expiry });
      if (redirect) {
        res.redirect(302, ticket.downloadUrl);
        return;
      }
      const response: DownloadImageResponse = {
        success: true,
        data: ticket,
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  }

  return {
    createImage,
    listImages,
    getImage,
    updateImageStatus,
    updateImageDetails,
    deleteImage,
    downloadImage,
  };
}
