// @campaign-demand/server
// tRPC API over the demand estimation engine

export { createServer, type CreateServerOptions } from './server.js';
export { loadConfig, type ServerConfig } from './lib/config.js';
export { appRouter, type AppRouter } from './lib/trpc/routers/index.js';
export { createCallerFactory } from './lib/trpc/index.js';
export { createContextFactory, type Context } from './lib/trpc/context.js';
export { formatEstimate, formatRowLabel, exportFilename } from './lib/presentation.js';
