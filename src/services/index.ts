export { healthService, HealthService } from './health.service';
export type { ReadinessReport } from './health.service';
export { ruleSetService, RuleSetService } from './ruleSet.service';
export type { RuleSetSummary } from './ruleSet.service';
export { classificationService } from './classification.service';
export * from './classification.service';
export { billingJoinService } from './billingJoin.service';
export * from './billingJoin.service';
export { paginationService } from './pagination.service';
export * from './pagination.service';
