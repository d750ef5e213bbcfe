/**
 * Error Bridge Module
 *
 * Routes uncaught exceptions, unhandled rejections and process warnings
 * into a registry logger.
 */
export type {
    NotificationKind,
    NotificationClass,
    ErrorBridgeOptions,
    CleanupFn,
} from './types.js'

export { ALL_NOTIFICATIONS } from './types.js'

export { ErrorBridge, severityForNotification, classifyWarning } from './bridge.js'
