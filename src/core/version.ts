export interface Version {
	/** One to three numeric components, most significant first */
	components: number[]
	/** Suffix including its leading dash, e.g. `-SNAPSHOT` */
	qualifier?: string
}

export type VersionParseResult =
	| { ok: true; version: Version }
	| { ok: false; error: string }

export const DEFAULT_SNAPSHOT_QUALIFIER = '-SNAPSHOT'

const VERSION_PATTERN = /^(\d+)(?:\.(\d+))?(?:\.(\d+))?(-[0-9A-Za-z.-]+)?$/

/**
 * Parse a version string (1, 1.2, 1.2.3, 1.2.3-SNAPSHOT, 2.0-RC1)
 */
export function parseVersion(input: string): VersionParseResult {
	const trimmed = input.trim()
	if (!trimmed) {
		return { ok: false, error: 'Version is empty' }
	}

	const match = VERSION_PATTERN.exec(trimmed)
	if (!match) {
		return { ok: false, error: `Invalid version format: ${trimmed}` }
	}

	const [, major, minor, patch, qualifier] = match
	const components = [major, minor, patch]
		.filter((part): part is string => part !== undefined)
		.map(Number)
	if (components.some((c) => !Number.isSafeInteger(c))) {
		return { ok: false, error: `Version component out of range: ${trimmed}` }
	}

	return { ok: true, version: qualifier ? { components, qualifier } : { components } }
}

export function formatVersion(version: Version): string {
	return `${version.components.join('.')}${version.qualifier ?? ''}`
}

export function isValidVersion(input: string): boolean {
	return parseVersion(input).ok
}

/**
 * Release version for a development version: the qualifier is dropped
 */
export function proposeRelease(current: Version): Version {
	return { components: [...current.components] }
}

/**
 * Next development version: bump the least significant component and mark it as a snapshot
 */
export function proposeNext(release: Version, qualifier = DEFAULT_SNAPSHOT_QUALIFIER): Version {
	const components = [...release.components]
	const last = components.length - 1
	components[last] = (components[last] ?? 0) + 1
	return qualifier ? { components, qualifier } : { components }
}

export function suggestReleaseVersion(current: string): string | null {
	const parsed = parseVersion(current)
	return parsed.ok ? formatVersion(proposeRelease(parsed.version)) : null
}

export function suggestNextVersion(
	release: string,
	qualifier = DEFAULT_SNAPSHOT_QUALIFIER
): string | null {
	const parsed = parseVersion(release)
	return parsed.ok ? formatVersion(proposeNext(parsed.version, qualifier)) : null
}

/**
 * Order by numeric components (missing ones count as 0);
 * a qualified version sorts before the same unqualified one
 */
export function compareVersions(a: Version, b: Version): number {
	const length = Math.max(a.components.length, b.components.length)
	for (let i = 0; i < length; i++) {
		const diff = (a.components[i] ?? 0) - (b.components[i] ?? 0)
		if (diff !== 0) return Math.sign(diff)
	}
	if (a.qualifier && !b.qualifier) return -1
	if (!a.qualifier && b.qualifier) return 1
	return 0
}

/**
 * Format version with optional prefix
 */
export function formatTagName(version: string, prefix = 'v'): string {
	return `${prefix}${version}`
}
