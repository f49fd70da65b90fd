export {
  ReconciliationService,
  ReconciliationServiceDeps,
  ReconciliationSummary,
} from './reconciliation.service';
