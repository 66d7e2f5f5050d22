/**
 * CyberSource Gateway - Main Entry Point
 * SOAP adapter for card authorize / capture / purchase / void / tax calculation
 */

export * from './shared/types';
export * from './shared/errors';
export * from './config';
export * from './modules/gateway';
