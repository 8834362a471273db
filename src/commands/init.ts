import { join } from 'node:path'
import consola from 'consola'
import pc from 'picocolors'
import { getDefaultConfig, loadConfig } from '../core/config.ts'
import { formatVersionDeclaration } from '../core/version-file.ts'
import { isValidVersion } from '../core/version.ts'
import type { ReleaseConfig } from '../types.ts'
import { ValidationError } from '../utils/errors.ts'
import { fileExists, readPackageJson, writeFile } from '../utils/fs.ts'

const CONFIG_TEMPLATE = `import { defineConfig } from 'release-steps'

export default defineConfig({
	// File holding the current version, rewritten by the set-version steps
	versionFile: 'version.conf',
	versionKey: 'version',

	// Development versions carry this qualifier (1.2.1-SNAPSHOT)
	snapshotQualifier: '-SNAPSHOT',

	// Release tags: v1.2.0
	tagPrefix: 'v',

	commitMessages: {
		release: 'Releasing {version}',
		next: 'Bump to {version}',
	},

	testCommand: ['npm', 'test'],

	// Limit how many replacement tag names are accepted when a tag exists
	// tagRetryLimit: 3,
})
`

const CONFIG_JSON_TEMPLATE: ReleaseConfig = {
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

export interface InitOptions {
	cwd?: string
	format?: 'ts' | 'json'
	force?: boolean
	/** Initial version; defaults to package.json's version with the snapshot qualifier */
	version?: string
}

export async function runInit(options: InitOptions = {}): Promise<void> {
	const cwd = options.cwd ?? process.cwd()
	const format = options.format ?? 'ts'

	const configFile = format === 'ts' ? 'release-steps.config.ts' : 'release-steps.config.json'
	const configPath = join(cwd, configFile)
	const keepConfig = fileExists(configPath) && !options.force
	// A freshly written template carries the defaults
	const config = keepConfig ? await loadConfig(cwd) : getDefaultConfig()

	if (keepConfig) {
		consola.warn(`${pc.cyan(configFile)} already exists. Use ${pc.dim('--force')} to overwrite.`)
	} else {
		const content =
			format === 'ts' ? CONFIG_TEMPLATE : `${JSON.stringify(CONFIG_JSON_TEMPLATE, null, '\t')}\n`
		writeFile(configPath, content)
		consola.success(`Created ${pc.cyan(configFile)}`)
	}

	const versionPath = join(cwd, config.versionFile)
	if (fileExists(versionPath) && !options.force) {
		consola.warn(`${pc.cyan(config.versionFile)} already exists. Use ${pc.dim('--force')} to overwrite.`)
		return
	}

	const pkgVersion = readPackageJson(cwd)?.version
	const version =
		options.version ?? (pkgVersion ? `${pkgVersion}${config.snapshotQualifier}` : `0.1.0${config.snapshotQualifier}`)
	if (!isValidVersion(version)) {
		throw new ValidationError(`Invalid version format: ${version}`, 'Use e.g. 1.0.0-SNAPSHOT')
	}

	writeFile(versionPath, formatVersionDeclaration(version, config.versionKey))
	consola.success(`Created ${pc.cyan(config.versionFile)} at ${pc.green(version)}`)

	consola.info(`
${pc.bold('Next steps:')}
  1. Commit ${pc.cyan(configFile)} and ${pc.cyan(config.versionFile)}
  2. Run ${pc.cyan('release-steps')} to cut a release
  3. Or run single steps, e.g. ${pc.cyan('release-steps release-git-checks')}
`)
}
