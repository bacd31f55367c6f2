import {
  InMemoryAlertStore,
  InMemoryRuleStore,
  PgAlertStore,
  PgRuleStore,
  SystemClock,
  configurePool,
} from '@fleet-alerts/adapters';
import type { AlertStorePort, ClockPort, RuleRepositoryPort } from '@fleet-alerts/domain';
import type { AppConfig } from './config/env.js';
import { AutoCloseScheduler } from './jobs/auto-close.scheduler.js';
import { AlertService } from './services/alerts/alert.service.js';
import { RuleCache } from './services/rules/rule-cache.js';
import { RuleEngine } from './services/rules/rule-engine.js';
import { RuleService } from './services/rules/rule.service.js';

/** Everything the HTTP layer and the scheduler need, built once per process. */
export interface AppContext {
  clock: ClockPort;
  engine: RuleEngine;
  alerts: AlertService;
  rules: RuleService;
  scheduler: AutoCloseScheduler;
}

export interface ContextParts {
  alertStore: AlertStorePort;
  ruleRepository: RuleRepositoryPort;
  clock: ClockPort;
  storeTimeoutMs: number;
  ruleCacheTtlMs: number;
  autoCloseIntervalMs: number;
  defaultRulesPath?: string;
}

export function createContext(parts: ContextParts): AppContext {
  const cache = new RuleCache(parts.ruleRepository, parts.clock, parts.ruleCacheTtlMs);
  const engine = new RuleEngine(parts.alertStore, cache, parts.clock, {
    storeTimeoutMs: parts.storeTimeoutMs,
  });
  return {
    clock: parts.clock,
    engine,
    alerts: new AlertService(parts.alertStore, engine, parts.clock),
    rules: new RuleService(parts.ruleRepository, cache, parts.defaultRulesPath),
    scheduler: new AutoCloseScheduler(engine, parts.clock, parts.autoCloseIntervalMs),
  };
}

export function createContextFromConfig(config: AppConfig): AppContext {
  const clock = new SystemClock();
  const shared = {
    clock,
    storeTimeoutMs: config.storeTimeoutMs,
    ruleCacheTtlMs: config.ruleCacheTtlMs,
    autoCloseIntervalMs: config.autoCloseIntervalMs,
  };

  if (config.storeDriver === 'memory') {
    return createContext({
      ...shared,
      alertStore: new InMemoryAlertStore(),
      ruleRepository: new InMemoryRuleStore(clock),
    });
  }

  configurePool({ connectionString: config.databaseUrl, queryTimeoutMs: config.storeTimeoutMs });
  return createContext({
    ...shared,
    alertStore: new PgAlertStore(),
    ruleRepository: new PgRuleStore(),
  });
}
