export { createContainer } from './container.js';
export type { Container, ContainerOptions } from './container.js';
export { getProductionContainer } from './container.production.js';
export { loadConfig } from './config.js';
export type { Config } from './config.js';

export * from './errors.js';
export * from './providers/index.js';

export { PartnershipService, loadPair } from './services/PartnershipService.js';
export { QuestionService } from './services/QuestionService.js';
export { AchievementService } from './services/AchievementService.js';
export { ConsistencyService, findIssues } from './services/ConsistencyService.js';
export type { ConsistencyIssue, ConsistencyIssueKind, ConsistencyReport } from './services/ConsistencyService.js';
export { NotificationDispatcher, Outbox } from './services/NotificationDispatcher.js';

export { UnitOfWork } from './repositories/UnitOfWork.js';
export { InMemoryBackend } from './repositories/InMemoryBackend.js';
export { SupabaseBackend } from './repositories/SupabaseBackend.js';
export type { ITransactionBackend, Changeset, RowReader } from './repositories/ITransactionBackend.js';
export type { IUnitOfWork, TransactionScope, RunOptions } from './repositories/ITransaction.js';

export type { IQuestionCache } from './stores/IQuestionCache.js';
export { InMemoryQuestionCache } from './stores/InMemoryQuestionCache.js';

export * from './engine/achievements.js';
export * from './engine/streak.js';
export * from './engine/calendar.js';
export * from './engine/stats.js';

export type * from './types/models.js';
export { PARTNERSHIP_STATUSES, INTERACTION_TYPES, ANSWER_VISIBILITIES, SHARED_PARTNERSHIP_FIELDS } from './types/models.js';
export type * from './types/api.js';
