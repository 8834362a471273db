import { readFile, writeFileAtomic } from '../utils/fs.ts'
import { resolveLineSeparator } from './config.ts'

/**
 * Render the version declaration: `<key> := "<version>"` framed by line separators
 */
export function formatVersionDeclaration(
	version: string,
	key = 'version',
	eol: string = resolveLineSeparator()
): string {
	return `${eol}${key} := "${version}"${eol}`
}

/**
 * Extract the version from a declaration file's content
 */
export function parseVersionDeclaration(content: string, key = 'version'): string | null {
	for (const line of content.split(/\r?\n/)) {
		const trimmed = line.trim()
		if (!trimmed.startsWith(key)) continue
		const rest = trimmed.slice(key.length)
		const match = /^\s*:=\s*"([^"]*)"\s*$/.exec(rest)
		if (match?.[1] !== undefined) return match[1]
	}
	return null
}

export function readVersionFile(path: string, key = 'version'): string | null {
	const content = readFile(path)
	if (content === null) return null
	return parseVersionDeclaration(content, key)
}

/**
 * Rewrite (never append) the version file
 */
export function writeVersionFile(path: string, version: string, key = 'version'): void {
	writeFileAtomic(path, formatVersionDeclaration(version, key))
}
