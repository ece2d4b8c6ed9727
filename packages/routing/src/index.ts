export {
  classifyRequest,
  LOG_LEVEL_HEADER,
  REGION_HEADER,
  REQUEST_TYPE_HEADER,
  resolveLogLevel,
  resolveRegion,
  resolveRequestKind,
  type RequestClassification
} from './classifier';
export {fnv1a64} from './hash';
export {ALL_REGION_CODES, getRegionProfile, parseRegionCode, REGION_PROFILES} from './regions';
export {buildActorId, routeToShard, selectShardIndex, SHARD_COUNT} from './shard';
