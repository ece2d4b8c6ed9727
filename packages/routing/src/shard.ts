import {TargetDescriptorSchema, type RegionCode, type TargetDescriptor} from '@edge-router/schemas';

import {fnv1a64} from './hash';
import {getRegionProfile} from './regions';

export const SHARD_COUNT = 10;

const toBytes = (body: Uint8Array | string) => (typeof body === 'string' ? Buffer.from(body, 'utf8') : body);

export const selectShardIndex = (body: Uint8Array | string, shardCount = SHARD_COUNT): number => {
  if (!Number.isInteger(shardCount) || shardCount < 1) {
    throw new RangeError(`shardCount must be a positive integer, got ${shardCount}`);
  }

  return Number(fnv1a64(toBytes(body)) % BigInt(shardCount));
};

export const buildActorId = (region: RegionCode, shardId: number) => `${region}-processor-${shardId}`;

/**
 * Maps a region and the raw request body onto one of the region's processor shards.
 * EU regions always come back with their own location hint.
 */
export const routeToShard = ({region, body}: {region: RegionCode; body: Uint8Array | string}): TargetDescriptor => {
  const profile = getRegionProfile(region);
  const shardId = selectShardIndex(body);

  return TargetDescriptorSchema.parse({
    region,
    namespace_id: profile.namespace_id,
    shard_id: shardId,
    actor_id: buildActorId(region, shardId),
    location_hint: profile.location_hint,
    is_eu: profile.is_eu
  });
};
