export { expressBinding } from "./binding.js";
export { getInertiaContext, type InertiaContext } from "./context.js";
export {
  inertiaMiddleware,
  redirectStatus,
  type InertiaMiddlewareOptions,
  type SharedPropsProvider,
  type TemporarySessionReader,
} from "./middleware.js";
export { inertiaPage, location, render, type PropsFactory } from "./render.js";
export { INTERNAL_ERROR_CODE, inertiaErrorHandler } from "./errorHandler.js";
export { requestLogger, type LogLine } from "./requestLogger.js";
export {
  startServer,
  type RendererLaunch,
  type RunningServer,
  type StartServerOptions,
} from "./lifecycle.js";
