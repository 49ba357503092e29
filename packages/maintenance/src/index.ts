export {
  MaintenanceService,
  type ClusterMapping,
  type CompositionRow,
  type StoredAddress,
} from './services/maintenance-service.js';
export { QualityService, type LowQualityAddress, type QualityMeasures } from './services/quality-service.js';
