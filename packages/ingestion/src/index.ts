export {
  IngestionService,
  type ActorpackInsertSummary,
  type InsertPackOptions,
  type TagpackInsertSummary,
} from './services/ingestion-service.js';
