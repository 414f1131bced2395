import { AccessDeniedError } from "../errors/catalog.js";

export type PermissionLevel = "read" | "write" | "owner";

const RANK: Record<PermissionLevel, number> = { read: 1, write: 2, owner: 3 };

/** owner ⊇ write ⊇ read */
export function levelSatisfies(
  granted: PermissionLevel,
  required: PermissionLevel,
): boolean {
  return RANK[granted] >= RANK[required];
}

export interface PermissionEntry {
  bucket: string;
  /** Undefined for a bucket-wide entry */
  key?: string;
  userId: string;
  level: PermissionLevel;
}

type UserLevels = Map<string, PermissionLevel>;

interface BucketEntries {
  bucketWide: UserLevels;
  objects: Map<string, UserLevels>;
}

/**
 * Per-facade permission table; lives only as long as the process.
 *
 * An object-level entry for the user takes precedence over the bucket-wide
 * one. Resources nobody holds an entry for are unmanaged and every check on
 * them passes.
 */
export class AuthorizationContext {
  private readonly entries = new Map<string, BucketEntries>();

  grant(bucket: string, key: string, userId: string, level: PermissionLevel): void {
    const objects = this.bucketEntries(bucket).objects;
    let users = objects.get(key);
    if (!users) {
      users = new Map();
      objects.set(key, users);
    }
    users.set(userId, level);
  }

  grantBucket(bucket: string, userId: string, level: PermissionLevel): void {
    this.bucketEntries(bucket).bucketWide.set(userId, level);
  }

  revoke(bucket: string, key: string | undefined, userId: string): boolean {
    const entries = this.entries.get(bucket);
    const users = key === undefined ? entries?.bucketWide : entries?.objects.get(key);
    return users?.delete(userId) ?? false;
  }

  /** Drop every entry for a bucket, e.g. once it is deleted. */
  forgetBucket(bucket: string): void {
    this.entries.delete(bucket);
  }

  /** Drop every entry for one object. */
  forgetObject(bucket: string, key: string): void {
    this.entries.get(bucket)?.objects.delete(key);
  }

  levelFor(bucket: string, key: string | undefined, userId: string): PermissionLevel | undefined {
    const entries = this.entries.get(bucket);
    if (key !== undefined) {
      const objectLevel = entries?.objects.get(key)?.get(userId);
      if (objectLevel !== undefined) return objectLevel;
    }
    return entries?.bucketWide.get(userId);
  }

  isManaged(bucket: string, key?: string): boolean {
    const entries = this.entries.get(bucket);
    if (!entries) return false;
    if (entries.bucketWide.size > 0) return true;
    return key !== undefined && (entries.objects.get(key)?.size ?? 0) > 0;
  }

  check(
    bucket: string,
    key: string | undefined,
    userId: string,
    required: PermissionLevel,
  ): boolean {
    if (!this.isManaged(bucket, key)) return true;
    const level = this.levelFor(bucket, key, userId);
    return level !== undefined && levelSatisfies(level, required);
  }

  /** @throws AccessDeniedError */
  assert(
    bucket: string,
    key: string | undefined,
    userId: string,
    required: PermissionLevel,
  ): void {
    if (!this.check(bucket, key, userId, required)) {
      throw new AccessDeniedError({
        bucket,
        ...(key !== undefined && { key }),
        userId,
        required,
      });
    }
  }

  list(): PermissionEntry[] {
    const result: PermissionEntry[] = [];
    for (const [bucket, { bucketWide, objects }] of this.entries) {
      for (const [userId, level] of bucketWide) {
        result.push({ bucket, userId, level });
      }
      for (const [key, users] of objects) {
        for (const [userId, level] of users) {
          result.push({ bucket, key, userId, level });
        }
      }
    }
    return result;
  }

  private bucketEntries(bucket: string): BucketEntries {
    let entries = this.entries.get(bucket);
    if (!entries) {
      entries = { bucketWide: new Map(), objects: new Map() };
      this.entries.set(bucket, entries);
    }
    return entries;
  }
}
