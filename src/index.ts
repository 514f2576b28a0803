export * from './domain';
export { FraktjaktClient, ENDPOINTS } from './carriers/fraktjakt/carrier';
export type { ClientOptions } from './carriers/fraktjakt/carrier';
export { describeShippingStatus, describeTrackResult } from './carriers/fraktjakt/status-codes';
export { HttpClient } from './http/client';
export type { Transport, HttpResponse } from './http/client';
export { createConsoleLogger, silentLogger } from './logging/logger';
export type { Logger } from './logging/logger';
export { ShippingService } from './services/shipping.service';
export type { QuoteResponse, OrderResponse, TrackingResponse, ClientFactory } from './services/shipping.service';
export { mergeSearchResults, rankByPrice } from './services/search-results';
export { OperationLogRepository } from './db/repository';
export { createPool, closePool } from './db/pool';
export { loadConfig } from './config';
export type { AppConfig, FraktjaktConfig } from './config';
