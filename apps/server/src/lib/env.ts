/**
 * Environment validation, fail-fast on startup.
 *
 * Import this module early in the server entry point. An invalid variable
 * throws immediately with a ConfigError naming it.
 */

import { readConverterConfig } from '@geomesh/config'

export const env = readConverterConfig(process.env)
