// src/s3/errors.ts

export type S3ErrorCode =
  | 'BucketAlreadyOwnedByYou'
  | 'BucketNotEmpty'
  | 'InvalidArgument'
  | 'InvalidBucketName'
  | 'NoSuchBucket'
  | 'NoSuchKey'
  | 'PreconditionFailed';

const STATUS: Record<S3ErrorCode, number> = {
  BucketAlreadyOwnedByYou: 409,
  BucketNotEmpty: 409,
  InvalidArgument: 400,
  InvalidBucketName: 400,
  NoSuchBucket: 404,
  NoSuchKey: 404,
  PreconditionFailed: 412,
};

export class S3Error extends Error {
  readonly status: number;

  constructor(
    readonly code: S3ErrorCode,
    message: string = code
  ) {
    super(message);
    this.name = 'S3Error';
    this.status = STATUS[code];
  }
}
