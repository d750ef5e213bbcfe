/**
 * Severity module exports.
 */
export type { SeverityName, SeverityInput } from './scale.js'

export {
    SEVERITIES,
    SEVERITY_COUNT,
    Severity,
    severityOrdinal,
    severityLabel,
    parseThreshold,
} from './scale.js'

export { UnknownSeverityError } from './errors.js'
