export type HeadObjectResult = { exists: true; size: number; contentType?: string } | { exists: false };

export type CreateUploadUrlArgs = {
  key: string;
  contentType: string;
  expiresIn: number;
};

export type CreateDownloadUrlArgs = {
  key: string;
  expiresIn: number;
  /** When set, the URL asks the object store to serve the file as an attachment with this name. */
  filename?: string;
};

export interface ImageObjectStorage {
  kind: 's3';
  readonly bucket: string;

  buildObjectKey(userId: string, filename: string, now?: Date): string;

  createUploadUrl(args: CreateUploadUrlArgs): Promise<string>;
  createDownloadUrl(args: CreateDownloadUrlArgs): Promise<string>;

  /** Not-found is a result, not an error. Anything else propagates. */
  headObject(key: string): Promise<HeadObjectResult>;

  deleteObject(key: string): Promise<void>;
}
