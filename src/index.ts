/**
 * TT-Optimize Service Entry Point
 */
import { startServer } from './api/server';

export * from './contracts/optimize';
export * from './optimizer';
export * from './objectives';
export * from './jobs';
export * from './config';
export { startServer, createApp, createJobRunner } from './api/server';

// Start server if running directly
if (require.main === module) {
  startServer();
}
