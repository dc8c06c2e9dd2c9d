import {
  S3Client,
  S3ServiceException,
  PutObjectCommand,
  HeadBucketCommand,
  ListObjectsV2Command,
  ListObjectsV2CommandOutput,
  ListObjectVersionsCommand,
  ListObjectVersionsCommandOutput,
  DeleteObjectsCommand,
  ObjectIdentifier,
  _Error as S3Error
} from '@aws-sdk/client-s3';
import { readFileSync, readdirSync, statSync } from 'fs';
import { join, relative, sep } from 'path';
import { ProvisioningError, describeError } from '../errors/index.js';
import { ExecutionContext, clientOptions } from '../config/credentials.js';
import { Logger } from '../utils/logger.js';
import { ObjectStore, SyncOptions, SyncResult } from './types.js';

// DeleteObjects accepts at most this many keys per request
const DELETE_BATCH_SIZE = 1000;

const CONTENT_TYPES: { [key: string]: string } = {
  'html': 'text/html',
  'htm': 'text/html',
  'css': 'text/css',
  'js': 'application/javascript',
  'mjs': 'application/javascript',
  'json': 'application/json',
  'map': 'application/json',
  'xml': 'application/xml',
  'png': 'image/png',
  'jpg': 'image/jpeg',
  'jpeg': 'image/jpeg',
  'gif': 'image/gif',
  'webp': 'image/webp',
  'svg': 'image/svg+xml',
  'ico': 'image/x-icon',
  'woff': 'font/woff',
  'woff2': 'font/woff2',
  'txt': 'text/plain',
  'pdf': 'application/pdf'
};

export function getContentType(filePath: string): string {
  const fileName = filePath.split(/[\\/]/).pop() ?? '';
  const ext = fileName.includes('.') ? fileName.split('.').pop()?.toLowerCase() : undefined;
  return CONTENT_TYPES[ext || ''] || 'application/octet-stream';
}

function isNotFound(error: unknown): boolean {
  if (error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404) {
    return true;
  }
  return error instanceof Error && (error.name === 'NotFound' || error.name === 'NoSuchBucket');
}

export class S3Manager implements ObjectStore {
  private client: S3Client;

  constructor(context: ExecutionContext, private readonly logger?: Logger) {
    this.client = new S3Client(clientOptions(context));
  }

  async bucketExists(bucketName: string): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucketName }));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw new ProvisioningError(`Failed to check bucket ${bucketName}: ${describeError(error)}`, { cause: error });
    }
  }

  async emptyBucket(bucketName: string): Promise<number> {
    let removed = 0;
    let keyMarker: string | undefined;
    let versionIdMarker: string | undefined;

    try {
      for (;;) {
        const page: ListObjectVersionsCommandOutput = await this.client.send(
          new ListObjectVersionsCommand({
            Bucket: bucketName,
            KeyMarker: keyMarker,
            VersionIdMarker: versionIdMarker
          })
        );

        const identifiers: ObjectIdentifier[] = [...(page.Versions ?? []), ...(page.DeleteMarkers ?? [])]
          .flatMap(entry => (entry.Key === undefined ? [] : [{ Key: entry.Key, VersionId: entry.VersionId }]));

        removed += await this.deleteObjects(bucketName, identifiers);

        if (!page.IsTruncated) {
          break;
        }
        keyMarker = page.NextKeyMarker;
        versionIdMarker = page.NextVersionIdMarker;
      }
    } catch (error) {
      if (isNotFound(error)) {
        return removed;
      }
      if (error instanceof ProvisioningError) {
        throw error;
      }
      throw new ProvisioningError(`Failed to empty bucket ${bucketName}: ${describeError(error)}`, { cause: error });
    }

    this.logger?.debug(`Removed ${removed} object versions from ${bucketName}`);
    return removed;
  }

  /**
   * Mirror a local directory into the bucket. Keys are the file paths
   * relative to `localPath`, with forward slashes.
   */
  async syncDirectory(bucketName: string, localPath: string, options: SyncOptions): Promise<SyncResult> {
    const files = this.getFilesRecursively(localPath);
    const localKeys = new Set<string>();
    const uploaded: string[] = [];

    for (const filePath of files) {
      const key = relative(localPath, filePath).split(sep).join('/');
      localKeys.add(key);
      await this.uploadFile(bucketName, key, filePath);
      uploaded.push(key);
    }

    let deleted: string[] = [];
    if (options.deleteExtraneous) {
      const remoteKeys = await this.listKeys(bucketName);
      deleted = remoteKeys.filter(key => !localKeys.has(key));
      await this.deleteObjects(bucketName, deleted.map(Key => ({ Key })));
    }

    this.logger?.debug(`Synced ${uploaded.length} files to ${bucketName}, deleted ${deleted.length}`);
    return { uploaded, deleted };
  }

  async putObject(bucketName: string, key: string, body: string, contentType: string): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: bucketName,
          Key: key,
          Body: body,
          ContentType: contentType
        })
      );
    } catch (error) {
      throw new ProvisioningError(`Failed to upload ${key} to ${bucketName}: ${describeError(error)}`, { cause: error });
    }
  }

  private async uploadFile(bucketName: string, key: string, filePath: string): Promise<void> {
    try {
      const fileContent = readFileSync(filePath);

      await this.client.send(
        new PutObjectCommand({
          Bucket: bucketName,
          Key: key,
          Body: fileContent,
          ContentType: getContentType(filePath)
        })
      );
    } catch (error) {
      throw new ProvisioningError(`Failed to upload file ${filePath} to S3: ${describeError(error)}`, {
        cause: error
      });
    }
  }

  private async listKeys(bucketName: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const page: ListObjectsV2CommandOutput = await this.client.send(
          new ListObjectsV2Command({ Bucket: bucketName, ContinuationToken: continuationToken })
        );
        for (const object of page.Contents ?? []) {
          if (object.Key !== undefined) {
            keys.push(object.Key);
          }
        }
        continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      throw new ProvisioningError(`Failed to list objects in ${bucketName}: ${describeError(error)}`, { cause: error });
    }

    return keys;
  }

  private async deleteObjects(bucketName: string, objects: ObjectIdentifier[]): Promise<number> {
    for (let start = 0; start < objects.length; start += DELETE_BATCH_SIZE) {
      const batch = objects.slice(start, start + DELETE_BATCH_SIZE);
      let failure: S3Error | undefined;
      try {
        const result = await this.client.send(
          new DeleteObjectsCommand({
            Bucket: bucketName,
            Delete: { Objects: batch, Quiet: true }
          })
        );
        failure = result.Errors?.[0];
      } catch (error) {
        throw new ProvisioningError(`Failed to delete objects from ${bucketName}: ${describeError(error)}`, {
          cause: error
        });
      }

      if (failure) {
        throw new ProvisioningError(
          `Failed to delete ${failure.Key ?? 'object'} from ${bucketName}: ${failure.Message ?? failure.Code ?? 'unknown error'}`
        );
      }
    }
    return objects.length;
  }

  private getFilesRecursively(dir: string): string[] {
    const files: string[] = [];
    const items = readdirSync(dir).sort();

    for (const item of items) {
      const fullPath = join(dir, item);
      const stat = statSync(fullPath);

      if (stat.isDirectory()) {
        files.push(...this.getFilesRecursively(fullPath));
      } else {
        files.push(fullPath);
      }
    }

    return files;
  }
}
