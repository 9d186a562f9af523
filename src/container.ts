/**
 * Dependency wiring.
 * Constructs all services over one transaction backend, notification
 * sink and log provider. Production passes Supabase implementations;
 * tests pass the in-memory backend and a mock sink.
 */

import type { ILogProvider } from './providers/ILogProvider.js';
import type { INotificationSink } from './providers/INotificationSink.js';
import type { ITransactionBackend } from './repositories/ITransactionBackend.js';
import { UnitOfWork } from './repositories/UnitOfWork.js';
import { AchievementService } from './services/AchievementService.js';
import { ConsistencyService } from './services/ConsistencyService.js';
import { NotificationDispatcher } from './services/NotificationDispatcher.js';
import { PartnershipService } from './services/PartnershipService.js';
import { QuestionService } from './services/QuestionService.js';
import type { IQuestionCache } from './stores/IQuestionCache.js';
import { InMemoryQuestionCache } from './stores/InMemoryQuestionCache.js';

export interface Container {
  unitOfWork: UnitOfWork;
  partnershipService: PartnershipService;
  questionService: QuestionService;
  achievementService: AchievementService;
  consistencyService: ConsistencyService;
  notifier: NotificationDispatcher;
  logProvider: ILogProvider;
}

export interface ContainerOptions {
  clock?: () => Date;
  random?: () => number;
  transactionTimeoutMs?: number;
  transactionMaxAttempts?: number;
  notifyMaxAttempts?: number;
  notifyBackoffMs?: number;
}

export function createContainer(
  deps: {
    backend: ITransactionBackend;
    notificationSink: INotificationSink;
    logProvider: ILogProvider;
    questionCache?: IQuestionCache;
  },
  options: ContainerOptions = {}
): Container {
  const clock = options.clock ?? (() => new Date());
  const logProvider = deps.logProvider;

  const unitOfWork = new UnitOfWork(deps.backend, {
    timeoutMs: options.transactionTimeoutMs,
    maxAttempts: options.transactionMaxAttempts,
    clock,
    logProvider,
  });
  const notifier = new NotificationDispatcher(deps.notificationSink, {
    maxAttempts: options.notifyMaxAttempts,
    backoffMs: options.notifyBackoffMs,
    logProvider,
  });
  const achievementService = new AchievementService(clock);

  return {
    unitOfWork,
    partnershipService: new PartnershipService(unitOfWork, achievementService, notifier, {
      clock,
      logProvider,
    }),
    questionService: new QuestionService(
      unitOfWork,
      achievementService,
      notifier,
      deps.questionCache ?? new InMemoryQuestionCache(() => clock().getTime()),
      { clock, random: options.random, logProvider }
    ),
    achievementService,
    consistencyService: new ConsistencyService(unitOfWork, logProvider),
    notifier,
    logProvider,
  };
}
