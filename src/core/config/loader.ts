/**
 * Registry configuration files.
 *
 * Loads bulk logger configuration from YAML or JSON. YAML is a JSON
 * superset, so one parser covers both.
 *
 * @example
 * ```yaml
 * # loggers.yml
 * default:
 *   - ./logs
 * audit:
 *   - ./logs/audit
 *   - severityThreshold: notice
 *     maxDays: 30
 *     maxFileSize: 10mb
 * ```
 */
import { readFile } from 'node:fs/promises'
import { parse as parseYaml } from 'yaml'
import { attempt, attemptSync } from '@logosdx/utils'

import { ConfigError } from './errors.js'
import { parseRegistryConfig, type RegistryEntry } from './schema.js'


/**
 * Read and validate a registry configuration file.
 *
 * @throws ConfigError if the file can't be read, isn't valid YAML/JSON,
 * or fails validation
 */
export async function loadRegistryConfig(filepath: string): Promise<Map<string, RegistryEntry>> {

    const [content, readErr] = await attempt(() => readFile(filepath, 'utf-8'))

    if (readErr) {

        throw new ConfigError(`Failed to read logger config: ${readErr.message}`, filepath)
    }

    const [parsed, yamlErr] = attemptSync(() => parseYaml(content))

    if (yamlErr) {

        throw new ConfigError(`Invalid YAML in logger config: ${yamlErr.message}`, filepath)
    }

    // Empty file: nothing to configure
    if (parsed === null || parsed === undefined) {

        return new Map()
    }

    return parseRegistryConfig(parsed)
}
