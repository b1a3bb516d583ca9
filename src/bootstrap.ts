/**
 * Wiring of connectors, state machines and drivers from a validated configuration
 */

import type { BotConfiguration } from './config/ConfigurationManager';
import type { IExchangeConnector } from './connectors/ExchangeConnector';
import { GeminiConnector } from './connectors/exchanges/GeminiConnector';
import { PaperConnector } from './connectors/exchanges/PaperConnector';
import { AuditService } from './services/AuditService';
import { CycleDriver } from './services/CycleDriver';
import { PositionStateMachine } from './services/PositionStateMachine';
import { TradingEngine } from './services/TradingEngine';

export function createConnector(config: BotConfiguration): IExchangeConnector {
  const { exchange } = config;
  const gemini = new GeminiConnector({
    baseUrl: exchange.apiUrl,
    credentials: exchange.credentials,
    network: exchange.network,
    retry: exchange.retry,
    rateLimiter: exchange.rateLimiter
  });

  if (exchange.adapter === 'paper') {
    return new PaperConnector(gemini, { markets: config.markets, balance: exchange.paperBalance });
  }
  return gemini;
}

/**
 * One state machine and driver per configured market, all registered on a single engine
 */
export function createEngine(
  config: BotConfiguration,
  connector: IExchangeConnector,
  auditService: AuditService = new AuditService()
): TradingEngine {
  const engine = new TradingEngine(connector, { tradeCycleIntervalMs: config.engine.tradeCycleIntervalMs });

  for (const market of config.markets) {
    const stateMachine = new PositionStateMachine(market, config.strategy, connector, { auditService });
    engine.registerMarket(
      new CycleDriver(market, connector, stateMachine, {
        haltOnFatalRead: config.engine.haltOnFatalRead,
        auditService
      })
    );
  }
  return engine;
}
