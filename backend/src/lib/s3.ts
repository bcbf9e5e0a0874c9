import {
  S3Client,
  GetObjectCommand,
  PutObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { config } from './config.js';

// Create S3 client
export const s3Client = new S3Client({ region: config.region });

// Generate presigned URL for download
export async function getPresignedDownloadUrl(
  bucket: string,
  key: string,
  filename: string,
  expiresIn: number = config.evidence.downloadUrlExpirySeconds
): Promise<string> {
  const command = new GetObjectCommand({
    Bucket: bucket,
    Key: key,
    ResponseContentDisposition: `attachment; filename="${filename}"`,
  });

  return getSignedUrl(s3Client, command, { expiresIn });
}

// Get object metadata
export async function getObjectMetadata(
  bucket: string,
  key: string
): Promise<{ contentLength: number; contentType: string; eTag: string } | null> {
  try {
    const command = new HeadObjectCommand({
      Bucket: bucket,
      Key: key,
    });
    const response = await s3Client.send(command);
    return {
      contentLength: response.ContentLength || 0,
      contentType: response.ContentType || 'application/octet-stream',
      eTag: response.ETag || '',
    };
  } catch (error: unknown) {
    if (error && typeof error === 'object' && 'name' in error && error.name === 'NotFound') {
      return null;
    }
    throw error;
  }
}

// Upload object
export async function putObject(
  bucket: string,
  key: string,
  body: string | Buffer,
  contentType: string,
  metadata?: Record<string, string>
): Promise<void> {
  const command = new PutObjectCommand({
    Bucket: bucket,
    Key: key,
    Body: body,
    ContentType: contentType,
    // Refuse to overwrite: every evidence key is unique per attempt
    IfNoneMatch: '*',
    Metadata: metadata,
  });
  await s3Client.send(command);
}

// Delete object (S3 treats a missing key as success)
export async function deleteObject(bucket: string, key: string): Promise<void> {
  const command = new DeleteObjectCommand({
    Bucket: bucket,
    Key: key,
  });
  await s3Client.send(command);
}
