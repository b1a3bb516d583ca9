/**
 * trailstop-bot - Main Entry Point
 * Scalping bot with stop-loss and trailing-stop exits for spot crypto exchanges
 */

export * from './models/Money';
export * from './models/Market';
export * from './models/Order';
export * from './models/Position';
export * from './models/AuditEvent';
export * from './utils/ErrorHandler';
export * from './utils/logger';
export * from './connectors/ExchangeConnector';
export * from './connectors/exchanges/GeminiConnector';
export * from './connectors/exchanges/PaperConnector';
export * from './services/AuditService';
export * from './services/PositionStateMachine';
export * from './services/CycleDriver';
export * from './services/TradingEngine';
export * from './config/ConfigurationManager';
export * from './bootstrap';

// Application version and metadata
export const APP_VERSION = '1.0.0';
export const APP_NAME = 'trailstop-bot';
