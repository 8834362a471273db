import { isAbsolute, join } from 'node:path'
import semver from 'semver'
import { $ } from 'zx'
import type { BuildHost, ResolvedReleaseConfig, TestReport } from '../types.ts'
import { readPackageJson } from '../utils/fs.ts'
import { readVersionFile, writeVersionFile } from './version-file.ts'

export interface NodeHostOptions {
	cwd: string
	config: ResolvedReleaseConfig
}

/** Dependency groups that end up in the published artifact */
const RUNTIME_GROUPS = ['dependencies', 'optionalDependencies', 'peerDependencies'] as const

const NON_REGISTRY_PREFIXES = ['file:', 'link:', 'git+', 'git:', 'github:', 'http:', 'https:']

/**
 * Whether a dependency specifier can resolve to something that changes under the release
 */
export function isUnstableSpecifier(specifier: string, snapshotQualifier = '-SNAPSHOT'): boolean {
	const spec = specifier.trim()
	if (!spec || spec === '*' || spec === 'latest') return true
	if (spec.startsWith('workspace:') || spec.startsWith('npm:')) return false
	if (NON_REGISTRY_PREFIXES.some((prefix) => spec.startsWith(prefix))) return true
	if (snapshotQualifier && spec.toLowerCase().includes(snapshotQualifier.toLowerCase())) return true

	// Anything else that is not a range is a dist-tag (next, canary, ...)
	if (semver.validRange(spec) === null) return true

	const min = semver.minVersion(spec)
	return min !== null && semver.prerelease(min) !== null
}

function scanGroup(deps: Record<string, string> | undefined, snapshotQualifier: string): string[] {
	if (!deps) return []
	return Object.entries(deps)
		.filter(([, spec]) => isUnstableSpecifier(spec, snapshotQualifier))
		.map(([name, spec]) => `${name}@${spec}`)
}

/**
 * BuildHost for a Node.js package: version file + package.json + test command
 */
export function createNodeHost(options: NodeHostOptions): BuildHost {
	const { cwd, config } = options
	const versionPath = isAbsolute(config.versionFile)
		? config.versionFile
		: join(cwd, config.versionFile)

	return {
		versionFile: config.versionFile,

		readVersion() {
			const declared = readVersionFile(versionPath, config.versionKey)
			if (declared !== null) return declared
			return readPackageJson(cwd)?.version ?? null
		},

		writeVersion(version: string) {
			writeVersionFile(versionPath, version, config.versionKey)
		},

		async snapshotDependencies() {
			const pkg = readPackageJson(cwd)
			if (!pkg) return []
			const found = RUNTIME_GROUPS.flatMap((group) => scanGroup(pkg[group], config.snapshotQualifier))
			return [...new Set(found)].sort()
		},

		async runTests(): Promise<TestReport> {
			const output = await $({ cwd, nothrow: true, stdio: 'inherit' })`${config.testCommand}`
			const exitCode = output.exitCode ?? 1
			return { success: exitCode === 0, exitCode }
		},
	}
}
