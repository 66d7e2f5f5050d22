export {
  GatewayConfig,
  GatewayConfigInput,
  GatewayConfigSchema,
  GatewayMode,
  LIVE_URL,
  TEST_URL,
  getGatewayMode,
  loadGatewayConfigFromEnv,
  parseGatewayConfig,
  setGatewayMode,
} from './gateway.config';
