import { S3Client } from '@aws-sdk/client-s3';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { AppConfig } from '../config/env.js';

export type AwsClients = {
  s3: S3Client;
  dynamo: DynamoDBDocumentClient;
};

export function createS3Client(config: AppConfig): S3Client {
  return new S3Client({
    region: config.aws.region,
    endpoint: config.aws.endpoint,
    forcePathStyle: config.s3.forcePathStyle,
    credentials: config.aws.credentials,
  });
}

export function createDynamoDocumentClient(config: AppConfig): DynamoDBDocumentClient {
  const base = new DynamoDBClient({
    region: config.aws.region,
    endpoint: config.aws.endpoint,
    credentials: config.aws.credentials,
  });
  return DynamoDBDocumentClient.from(base, {
    marshallOptions: {
      // Optional attributes are left out instead of stored as NULL.
      removeUndefinedValues: true,
    },
  });
}

export function createAwsClients(config: AppConfig): AwsClients {
  return {
    s3: createS3Client(config),
    dynamo: createDynamoDocumentClient(config),
  };
}
