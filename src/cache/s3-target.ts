import {
  BucketLocationConstraint,
  CreateBucketCommand,
  GetObjectCommand,
  HeadBucketCommand,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { logger } from '../shared/logger.js';
import type { RemoteCacheTarget } from './types.js';

const LOCATION_CONSTRAINTS: readonly string[] = Object.values(BucketLocationConstraint);

function isLocationConstraint(region: string): region is BucketLocationConstraint {
  return LOCATION_CONSTRAINTS.includes(region);
}

function errorName(err: unknown): string | undefined {
  return err instanceof Error ? err.name : undefined;
}

function httpStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('$metadata' in err)) return undefined;
  const metadata = err.$metadata;
  if (typeof metadata !== 'object' || metadata === null || !('httpStatusCode' in metadata)) {
    return undefined;
  }
  return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
}

export interface S3CacheTargetOptions {
  bucket: string;
  region?: string;
  /** Shared-config profile for credentials; ignored when `client` is given. */
  profile?: string;
  client?: S3Client;
}

/**
 * S3 bucket holding the shared cache object. The bucket is created on first
 * save when it does not exist yet.
 */
export class S3CacheTarget implements RemoteCacheTarget {
  readonly name: string;
  private readonly region: string | undefined;
  private readonly client: S3Client;
  private ensured = false;

  constructor(options: S3CacheTargetOptions) {
    this.name = options.bucket;
    this.region = options.region;
    const endpoint = process.env['AWS_ENDPOINT_URL'];
    this.client =
      options.client ??
      new S3Client({
        ...(options.region ? { region: options.region } : {}),
        ...(options.profile ? { profile: options.profile } : {}),
        ...(endpoint ? { endpoint, forcePathStyle: true } : {}),
      });
  }

  async read(key: string): Promise<Uint8Array | null> {
    try {
      const output = await this.client.send(new GetObjectCommand({ Bucket: this.name, Key: key }));
      if (!output.Body) return new Uint8Array();
      return await output.Body.transformToByteArray();
    } catch (err: unknown) {
      if (errorName(err) === 'NoSuchKey') return null;
      throw err;
    }
  }

  async ensureContainer(): Promise<void> {
    if (this.ensured) return;
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.name }));
    } catch (err: unknown) {
      if (errorName(err) !== 'NotFound' && httpStatus(err) !== 404) throw err;
      await this.createBucket();
    }
    this.ensured = true;
  }

  async write(key: string, body: Uint8Array): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.name,
        Key: key,
        Body: body,
        ContentType: 'application/json',
      }),
    );
  }

  private async createBucket(): Promise<void> {
    logger.info('Creating cache bucket', { bucket: this.name, region: this.region });
    // us-east-1 is the one region that rejects an explicit location constraint
    const location =
      this.region && this.region !== 'us-east-1' && isLocationConstraint(this.region)
        ? this.region
        : undefined;
    try {
      await this.client.send(
        new CreateBucketCommand({
          Bucket: this.name,
          ...(location ? { CreateBucketConfiguration: { LocationConstraint: location } } : {}),
        }),
      );
    } catch (err: unknown) {
      if (errorName(err) === 'BucketAlreadyOwnedByYou') return;
      throw err;
    }
  }
}
