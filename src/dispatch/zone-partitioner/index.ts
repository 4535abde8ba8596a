/**
 * Zone Partitioner Module
 */

export type { IZonePartitioner, ZonePartitionerConfig, ZoneAssignment } from './types.js';
export { ZonePartitioner, zoneCenter, isInZone } from './zone-partitioner.js';
