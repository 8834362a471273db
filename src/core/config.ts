import { EOL } from 'node:os'
import { join } from 'node:path'
import { pathToFileURL } from 'node:url'
import consola from 'consola'
import { defu } from 'defu'
import type { ReleaseConfig, ResolvedReleaseConfig } from '../types.ts'
import { ConfigError } from '../utils/errors.ts'
import { fileExists, readFile } from '../utils/fs.ts'

const CONFIG_FILES = [
	'release-steps.config.ts',
	'release-steps.config.js',
	'release-steps.config.json',
	'.releasestepsrc',
	'.releasestepsrc.json',
]

const DEFAULT_CONFIG: ResolvedReleaseConfig = {
	versionFile: 'version.conf',
	versionKey: 'version',
	snapshotQualifier: '-SNAPSHOT',
	tagPrefix: 'v',
	commitMessages: {
		release: 'Releasing {version}',
		next: 'Bump to {version}',
	},
	testCommand: ['npm', 'test'],
}

function cloneDefaults(): ResolvedReleaseConfig {
	return {
		...DEFAULT_CONFIG,
		commitMessages: { ...DEFAULT_CONFIG.commitMessages },
		testCommand: [...DEFAULT_CONFIG.testCommand],
	}
}

/**
 * Fill in defaults and check the values that would break a release halfway through
 */
export function resolveConfig(userConfig: ReleaseConfig = {}): ResolvedReleaseConfig {
	const defaults = cloneDefaults()
	const merged = defu(userConfig, defaults)

	// Arrays are replaced, not concatenated
	const testCommand = userConfig.testCommand ?? defaults.testCommand
	if (testCommand.length === 0) {
		throw new ConfigError('testCommand must not be empty', 'Use e.g. ["npm", "test"]')
	}

	const tagRetryLimit = merged.tagRetryLimit ?? undefined
	if (tagRetryLimit !== undefined && (!Number.isInteger(tagRetryLimit) || tagRetryLimit < 0)) {
		throw new ConfigError(`tagRetryLimit must be a non-negative integer, got ${tagRetryLimit}`)
	}

	const versionFile = merged.versionFile ?? defaults.versionFile
	if (!versionFile.trim()) {
		throw new ConfigError('versionFile must not be empty')
	}

	return {
		versionFile,
		versionKey: merged.versionKey ?? defaults.versionKey,
		snapshotQualifier: merged.snapshotQualifier ?? defaults.snapshotQualifier,
		tagPrefix: merged.tagPrefix ?? defaults.tagPrefix,
		commitMessages: {
			release: merged.commitMessages?.release ?? defaults.commitMessages.release,
			next: merged.commitMessages?.next ?? defaults.commitMessages.next,
		},
		testCommand,
		...(tagRetryLimit !== undefined ? { tagRetryLimit } : {}),
	}
}

/**
 * Load config from file
 */
export async function loadConfig(cwd: string): Promise<ResolvedReleaseConfig> {
	for (const configFile of CONFIG_FILES) {
		const configPath = join(cwd, configFile)
		if (!fileExists(configPath)) continue

		if (configFile.endsWith('.ts') || configFile.endsWith('.js')) {
			// Dynamic import for JS/TS configs
			try {
				const module = await import(pathToFileURL(configPath).href)
				const userConfig: ReleaseConfig = module.default ?? module
				return resolveConfig(userConfig)
			} catch (error) {
				if (error instanceof ConfigError) throw error
				consola.warn(`Failed to load ${configFile}, trying next config file`)
				consola.debug(error)
			}
			continue
		}

		// JSON config
		const content = readFile(configPath)
		if (content) {
			try {
				const userConfig: ReleaseConfig = JSON.parse(content)
				return resolveConfig(userConfig)
			} catch (error) {
				if (error instanceof ConfigError) throw error
				consola.warn(`Failed to parse ${configFile}, trying next config file`)
				consola.debug(error)
			}
		}
	}

	return cloneDefaults()
}

/**
 * Get default config
 */
export function getDefaultConfig(): ResolvedReleaseConfig {
	return cloneDefaults()
}

/**
 * Define config helper for TypeScript support
 */
export function defineConfig(config: ReleaseConfig): ReleaseConfig {
	return config
}

/**
 * Platform line separator used in the version file
 */
export function resolveLineSeparator(eol: string = EOL): string {
	if (!eol) {
		throw new ConfigError('No line separator available for this platform')
	}
	return eol
}
