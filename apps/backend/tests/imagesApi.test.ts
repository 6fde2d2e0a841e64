import request from 'supertest';
import { describe, expect, it, vi } from 'vitest';
import { createApp } from '../src/app.js';
import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { createImageMetadataRepository } from '../src/repositories/ImageMetadataRepository.js';
import { ImageService } from '../src/services/image/ImageService.js';
import { IMAGE_ID } from './factories/index.js';
import { createInMemoryImageRepository } from './mocks/repositories.js';
import { createFakeStorage } from './mocks/storage.js';

function setup() {
  const repo = createInMemoryImageRepository();
  const storage = createFakeStorage();
  // one second per call, so uploads sort in creation order
  let tick = 0;
  const now = () => new Date(Date.UTC(2024, 0, 15, 10, 0, tick++));
  const images = new ImageService({
    repo,
    storage,
    config: { maxImageSize: 10 * 1024 * 1024, allowedContentTypes: ['image/jpeg', 'image/png'], defaultUrlExpirySeconds: 900 },
    now,
  });
  const app = createApp({ services: { images } });
  return { app, repo, storage };
}

type App = ReturnType<typeof setup>['app'];

async function upload(app: App, userId: string, body: Record<string, unknown> = {}) {
  const res = await request(app)
    .post('/v1/images')
    .set('user-id', userId)
    .send({ filename: 'cat.png', contentType: 'image/png', ...body });
  expect(res.status).toBe(201);
  return res.body.data as { imageId: string; objectKey: string };
}

describe('images API', () => {
  it('reports health and echoes a request id', async () => {
    const { app } = setup();

    const res = await request(app).get('/health').set('X-Request-Id', 'req-1');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
    expect(res.headers['x-request-id']).toBe('req-1');
  });

  it('requires the user-id header', async () => {
    const { app } = setup();

    const res = await request(app).get('/v1/images').set('X-Request-Id', 'req-2');

    expect(res.status).toBe(401);
    expect(res.body).toEqual({
      success: false,
      error: { code: 'UNAUTHORIZED', message: 'Missing user-id header' },
      requestId: 'req-2',
    });
  });

  it('rejects a malformed user id', async () => {
    const { app } = setup();

    const res = await request(app).get('/v1/images').set('user-id', 'a.b');

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'User ID can only contain letters, numbers, hyphens, and underscores',
    });
  });

  it('issues an upload ticket', async () => {
    const { app, repo } = setup();

    const res = await request(app)
      .post('/v1/images')
      .set('user-id', 'alice')
      .send({ filename: 'cat.png', contentType: 'image/png', tags: ['pets'] });

    expect(res.status).toBe(201);
    expect(res.body.message).toBe('Upload URL generated. Upload the file with a PUT request to uploadUrl.');
    expect(res.body.data).toMatchObject({
      uploadUrl: 'https://s3.test/test-bucket/alice/20240115/00000001_cat.png?op=put',
      objectKey: 'alice/20240115/00000001_cat.png',
      bucket: 'test-bucket',
      expirySeconds: 900,
      uploadMethod: 'PUT',
      headers: { 'Content-Type': 'image/png' },
      image: {
        userId: 'alice',
        filename: 'cat.png',
        size: 0,
        tags: ['pets'],
        description: null,
        width: null,
        height: null,
        status: 'processing',
        uploadTimestamp: '2024-01-15T10:00:00.000Z',
        metadata: { presignedUpload: true },
      },
    });
    expect(repo.records.has(res.body.data.imageId)).toBe(true);
  });

  it('validates the upload request body', async () => {
    const { app } = setup();

    const res = await request(app).post('/v1/images').set('user-id', 'alice').send({ filename: 'cat.png' });

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Invalid request data',
      details: { issues: [{ path: 'contentType', message: 'Required' }] },
    });
  });

  it('rejects disallowed content types', async () => {
    const { app } = setup();

    const res = await request(app)
      .post('/v1/images')
      .set('user-id', 'alice')
      .send({ filename: 'cat.gif', contentType: 'image/gif' });

    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe("Content type 'image/gif' is not allowed. Allowed types: image/jpeg, image/png");
  });

  it('activates an image once the object is uploaded', async () => {
    const { app, storage } = setup();
    const { imageId, objectKey } = await upload(app, 'alice');

    const early = await request(app).patch(`/v1/images/${imageId}`).set('user-id', 'alice').send({ status: 'active' });
    expect(early.status).toBe(400);
    expect(early.body.error).toEqual({
      code: 'UPLOAD_NOT_FOUND',
      message: 'Image has not been uploaded yet',
      details: { objectKey },
    });

    storage.objects.set(objectKey, 2048);
    const res = await request(app).patch(`/v1/images/${imageId}`).set('user-id', 'alice').send({ status: 'active' });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      success: true,
      message: 'Image status updated to active',
      data: { imageId, status: 'active', size: 2048 },
    });

    const fetched = await request(app).get(`/v1/images/${imageId}`).set('user-id', 'alice');
    expect(fetched.body.data).toMatchObject({
      status: 'active',
      size: 2048,
      metadata: { presignedUpload: true, statusUpdatedAt: '2024-01-15T10:00:01.000Z' },
    });
  });

  it('rejects deleted as a status update', async () => {
    const { app } = setup();
    const { imageId } = await upload(app, 'alice');

    const res = await request(app).patch(`/v1/images/${imageId}`).set('user-id', 'alice').send({ status: 'deleted' });

    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe('Invalid request data');
  });

  it('rejects a status change out of error', async () => {
    const { app } = setup();
    const { imageId } = await upload(app, 'alice');
    await request(app).patch(`/v1/images/${imageId}`).set('user-id', 'alice').send({ status: 'error' });

    const res = await request(app).patch(`/v1/images/${imageId}`).set('user-id', 'alice').send({ status: 'active' });

    expect(res.status).toBe(409);
    expect(res.body.error).toEqual({
      code: 'INVALID_STATUS_TRANSITION',
      message: "Cannot change status from 'error' to 'active'",
    });
  });

  it('keeps other users out', async () => {
    const { app } = setup();
    const { imageId } = await upload(app, 'alice');

    const res = await request(app).get(`/v1/images/${imageId}`).set('user-id', 'mallory');

    expect(res.status).toBe(403);
    expect(res.body.error).toEqual({ code: 'FORBIDDEN', message: 'You do not have access to this image' });
  });

  it('keeps other users from changing or downloading an image', async () => {
    const { app, repo } = setup();
    const { imageId } = await upload(app, 'alice');
    const forbidden = { code: 'FORBIDDEN', message: 'You do not have access to this image' };

    const status = await request(app).patch(`/v1/images/${imageId}`).set('user-id', 'mallory').send({ status: 'error' });
    const details = await request(app)
      .patch(`/v1/images/${imageId}/details`)
      .set('user-id', 'mallory')
      .send({ tags: ['mine'] });
    const download = await request(app).get(`/v1/images/${imageId}/download`).set('user-id', 'mallory');

    expect([status.status, details.status, download.status]).toEqual([403, 403, 403]);
    expect(status.body.error).toEqual(forbidden);
    expect(details.body.error).toEqual(forbidden);
    expect(download.body.error).toEqual(forbidden);
    expect(repo.records.get(imageId)).toMatchObject({ status: 'processing', tags: [] });
  });

  it('pages through the caller’s images newest first', async () => {
    const { app } = setup();
    await upload(app, 'alice', { filename: 'a.png' });
    await upload(app, 'alice', { filename: 'b.png' });
    await upload(app, 'bob', { filename: 'x.png' });
    await upload(app, 'alice', { filename: 'c.png' });

    const first = await request(app).get('/v1/images').query({ limit: 2 }).set('user-id', 'alice');
    expect(first.status).toBe(200);
    expect(first.body.data.items.map((i: { filename: string }) => i.filename)).toEqual(['c.png', 'b.png']);
    expect(first.body.data.count).toBe(2);
    expect(first.body.data.hasMore).toBe(true);

    const second = await request(app)
      .get('/v1/images')
      .query({ limit: 2, nextToken: first.body.data.nextToken })
      .set('user-id', 'alice');
    expect(second.body.data).toMatchObject({ count: 1, nextToken: null, hasMore: false });
    expect(second.body.data.items[0].filename).toBe('a.png');
  });

  it('filters by any of the given tags', async () => {
    const { app } = setup();
    await upload(app, 'alice', { filename: 'cat.png', tags: ['pets'] });
    await upload(app, 'alice', { filename: 'soup.png', tags: ['food'] });

    const res = await request(app).get('/v1/images').query({ tags: 'food, travel' }).set('user-id', 'alice');

    expect(res.body.data.items.map((i: { filename: string }) => i.filename)).toEqual(['soup.png']);
  });

  it('accepts snake_case list parameters', async () => {
    const { app } = setup();
    await upload(app, 'alice', { filename: 'a.jpg', contentType: 'image/jpeg' });
    await upload(app, 'alice', { filename: 'b.png' });
    await upload(app, 'alice', { filename: 'c.jpg', contentType: 'image/jpeg' });

    const first = await request(app)
      .get('/v1/images')
      .query({ content_type: 'image/jpeg', limit: 1 })
      .set('user-id', 'alice');
    expect(first.body.data.items.map((i: { filename: string }) => i.filename)).toEqual(['c.jpg']);
    expect(first.body.data.hasMore).toBe(true);

    const second = await request(app)
      .get('/v1/images')
      .query({ content_type: 'image/jpeg', limit: 1, next_token: first.body.data.nextToken })
      .set('user-id', 'alice');
    expect(second.body.data.items.map((i: { filename: string }) => i.filename)).toEqual(['a.jpg']);
  });

  it('rejects a malformed page token', async () => {
    const { app } = setup();

    const res = await request(app).get('/v1/images').query({ nextToken: 'not-a-token' }).set('user-id', 'alice');

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('INVALID_PAGINATION_TOKEN');
    expect(res.body.error.message).toBe('Invalid pagination token');
  });

  it('updates and clears the description', async () => {
    const { app } = setup();
    const { imageId } = await upload(app, 'alice');

    const set = await request(app)
      .patch(`/v1/images/${imageId}/details`)
      .set('user-id', 'alice')
      .send({ tags: ['cats'], description: 'on the sofa' });
    expect(set.status).toBe(200);
    expect(set.body.data).toMatchObject({ tags: ['cats'], description: 'on the sofa' });

    const cleared = await request(app)
      .patch(`/v1/images/${imageId}/details`)
      .set('user-id', 'alice')
      .send({ description: null });
    expect(cleared.body.data).toMatchObject({ tags: ['cats'], description: null });
  });

  it('rejects unknown fields in a details update', async () => {
    const { app } = setup();
    const { imageId } = await upload(app, 'alice');

    const res = await request(app)
      .patch(`/v1/images/${imageId}/details`)
      .set('user-id', 'alice')
      .send({ tags: ['cats'], userId: 'bob' });

    expect(res.status).toBe(400);
  });

  it('soft-deletes and then refuses downloads and updates', async () => {
    const { app } = setup();
    const { imageId } = await upload(app, 'alice');

    const del = await request(app).delete(`/v1/images/${imageId}`).set('user-id', 'alice');
    expect(del.status).toBe(200);
    expect(del.body).toEqual({
      success: true,
      message: 'Image marked as deleted',
      data: { imageId, deleted: true, deleteType: 'soft' },
    });

    const fetched = await request(app).get(`/v1/images/${imageId}`).set('user-id', 'alice');
    expect(fetched.body.data.status).toBe('deleted');
    expect(fetched.body.data.metadata.deletedAt).toBe('2024-01-15T10:00:01.000Z');

    const download = await request(app).get(`/v1/images/${imageId}/download`).set('user-id', 'alice');
    expect(download.status).toBe(410);
    expect(download.body.error.code).toBe('IMAGE_GONE');

    const patch = await request(app).patch(`/v1/images/${imageId}`).set('user-id', 'alice').send({ status: 'error' });
    expect(patch.status).toBe(409);
    expect(patch.body.error.code).toBe('IMAGE_DELETED');
  });

  it('hard-deletes the object and the record', async () => {
    const { app, repo, storage } = setup();
    const { imageId, objectKey } = await upload(app, 'alice');
    storage.objects.set(objectKey, 2048);

    const del = await request(app).delete(`/v1/images/${imageId}`).query({ hardDelete: 'true' }).set('user-id', 'alice');

    expect(del.body.message).toBe('Image permanently deleted');
    expect(del.body.data.deleteType).toBe('hard');
    expect(repo.records.size).toBe(0);
    expect(storage.objects.has(objectKey)).toBe(false);

    const fetched = await request(app).get(`/v1/images/${imageId}`).set('user-id', 'alice');
    expect(fetched.status).toBe(404);
    expect(fetched.body.error).toEqual({ code: 'IMAGE_NOT_FOUND', message: 'Image not found' });
  });

  it('returns a download URL or redirects to it', async () => {
    const { app } = setup();
    const { imageId, objectKey } = await upload(app, 'alice');

    const res = await request(app).get(`/v1/images/${imageId}/download`).set('user-id', 'alice');
    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({
      downloadUrl: `https://s3.test/test-bucket/${objectKey}?op=get&expires=900`,
      imageId,
      expirySeconds: 900,
      expiresAt: '2024-01-15T10:15:01.000Z',
    });

    const redirect = await request(app)
      .get(`/v1/images/${imageId}/download`)
      .query({ expiry: 60, redirect: 'true' })
      .set('user-id', 'alice');
    expect(redirect.status).toBe(302);
    expect(redirect.headers.location).toBe(`https://s3.test/test-bucket/${objectKey}?op=get&expires=60`);
  });

  it('rejects a malformed image id', async () => {
    const { app } = setup();

    const res = await request(app).get('/v1/images/not-a-uuid').set('user-id', 'alice');

    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe('Invalid image ID format');
  });

  it('reports a missing image', async () => {
    const { app } = setup();

    const res = await request(app).get(`/v1/images/${IMAGE_ID}`).set('user-id', 'alice');

    expect(res.status).toBe(404);
  });

  it('answers a corrupt stored record with INTERNAL_ERROR', async () => {
    const send = vi.fn().mockResolvedValue({ Item: { image_id: IMAGE_ID, user_id: 'alice', filename: 'cat.png' } });
    const client = { send } as unknown as DynamoDBDocumentClient;
    const images = new ImageService({
      repo: createImageMetadataRepository(client, { tableName: 'images-test', userIndex: 'user-index' }),
      storage: createFakeStorage(),
      config: { maxImageSize: 10 * 1024 * 1024, allowedContentTypes: ['image/png'], defaultUrlExpirySeconds: 900 },
    });
    const app = createApp({ services: { images } });

    const res = await request(app).get(`/v1/images/${IMAGE_ID}`).set('user-id', 'alice');

    expect(res.status).toBe(500);
    expect(res.body.success).toBe(false);
    expect(res.body.error.code).toBe('INTERNAL_ERROR');
  });

  it('answers unknown routes with NOT_FOUND', async () => {
    const { app } = setup();

    const res = await request(app).get('/v1/nope');

    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({ code: 'NOT_FOUND', message: 'Route GET /v1/nope not found' });
  });

  it('rejects malformed JSON', async () => {
    const { app } = setup();

    const res = await request(app)
      .post('/v1/images')
      .set('user-id', 'alice')
      .set('Content-Type', 'application/json')
      .send('{"filename":');

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({ code: 'VALIDATION_ERROR', message: 'Malformed JSON body' });
  });
});
