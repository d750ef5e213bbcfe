/**
 * Error bridge types.
 *
 * Describe which process notifications get forwarded into a logger
 * and how they are classified.
 */

/**
 * Process notifications the bridge can subscribe to.
 *
 * - `exception`: uncaughtException
 * - `rejection`: unhandledRejection
 * - `warning`: process warnings (deprecations, experimental features, ...)
 * - `exit`: beforeExit; flushes whatever the logger still buffers
 */
export type NotificationKind = 'exception' | 'rejection' | 'warning' | 'exit';

/**
 * Severity class a notification maps to.
 *
 * `unrecognized` covers notification types the bridge doesn't know;
 * they're still logged, as a warning with a diagnostic message.
 */
export type NotificationClass = 'fatal' | 'error' | 'warning' | 'notice' | 'unrecognized';

/**
 * Options for an ErrorBridge.
 *
 * @example
 * ```typescript
 * const bridge = new ErrorBridge(registry, {
 *     logger: 'errors',
 *     capture: ['exception', 'rejection'],
 *     display: true,
 * })
 * ```
 */
export interface ErrorBridgeOptions {
    /**
     * Name of the registry logger that receives notifications.
     * @default 'default'
     */
    logger?: string;

    /**
     * Notification kinds to subscribe to.
     * @default ['exception', 'rejection', 'warning', 'exit']
     */
    capture?: NotificationKind[];

    /**
     * Also print captured errors to stderr.
     * @default false
     */
    display?: boolean;

    /**
     * Exit with code 1 after an uncaught exception is logged and flushed.
     *
     * Installing an uncaughtException listener stops Node from crashing
     * on its own, so this keeps the default crash behavior.
     * @default true
     */
    exitOnException?: boolean;
}

/**
 * Handler cleanup function.
 */
export type CleanupFn = () => void;

/**
 * Default notification kinds.
 */
export const ALL_NOTIFICATIONS: NotificationKind[] = ['exception', 'rejection', 'warning', 'exit'];
