export { env, loadEnv, type EnvConfig } from './env';
export {
  loadReconciliationConfig,
  parseReconciliationConfig,
  reconciliationConfigSchema,
  type ReconciliationConfig,
  type ReconciliationConfigInput,
  type EncounterCategoryConfig,
  type PayerTypeConfig,
  type DispositionRuleConfig,
  type KnownFacilityConfig,
} from './reconciliation';
