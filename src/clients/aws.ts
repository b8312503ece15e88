import { S3Client } from '@aws-sdk/client-s3';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { AwsSettings } from '../config';

function clientOptions(aws: AwsSettings) {
  return {
    region: aws.region,
    credentials: aws.credentials,
    maxAttempts: 1,
    requestHandler: {
      connectionTimeout: aws.requestTimeoutMs,
      requestTimeout: aws.requestTimeoutMs,
    },
  };
}

export type S3ClientFactory = () => S3Client;
export type DynamoDBClientFactory = () => DynamoDBClient;

export const createS3Client = (aws: AwsSettings): S3Client => new S3Client(clientOptions(aws));

export const createDynamoDBClient = (aws: AwsSettings): DynamoDBClient =>
  new DynamoDBClient(clientOptions(aws));
