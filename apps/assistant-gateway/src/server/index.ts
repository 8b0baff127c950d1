export { createServer } from './create-server';
export type { GatewayFastifyInstance, ServerOptions } from './create-server';
