import type { ImageListItem, ImageMetadataDto, UploadTicket as UploadTicketDto } from '@imagevault/api-contracts';
import type { ImageMetadata } from '../../../domain/image/ImageMetadata.js';
import type { UploadTicket } from '../../../services/image/ImageService.js';

export function toImageListItem(record: ImageMetadata): ImageListItem {
  return {
    imageId: record.imageId,
    userId: record.userId,
    filename: record.filename,
    contentType: record.contentType,
    size: record.size,
    uploadTimestamp: record.uploadTimestamp,
    tags: record.tags,
    description: record.description ?? null,
    width: record.width ?? null,
    height: record.height ?? null,
    status: record.status,
  };
}

export function toImageMetadataDto(record: ImageMetadata): ImageMetadataDto {
  return {
    ...toImageListItem(record),
    s3Key: record.s3Key,
    s3Bucket: record.s3Bucket,
    metadata: record.metadata,
  };
}

export function toUploadTicketDto(ticket: UploadTicket): UploadTicketDto {
  return {
    ...ticket,
    image: toImageMetadataDto(ticket.image),
  };
}
