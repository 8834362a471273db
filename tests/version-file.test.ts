import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdirSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs'
import { EOL, tmpdir } from 'node:os'
import { join } from 'node:path'
import {
	formatVersionDeclaration,
	parseVersionDeclaration,
	readVersionFile,
	writeVersionFile,
} from '../src/core/version-file.ts'

const TEST_DIR = join(tmpdir(), 'release-steps-version-file-test')

describe('version file', () => {
	beforeEach(() => {
		rmSync(TEST_DIR, { recursive: true, force: true })
		mkdirSync(TEST_DIR, { recursive: true })
	})

	afterEach(() => {
		rmSync(TEST_DIR, { recursive: true, force: true })
	})

	describe('formatVersionDeclaration', () => {
		it('should frame the declaration with the line separator', () => {
			expect(formatVersionDeclaration('1.2.0', 'version', '\n')).toBe('\nversion := "1.2.0"\n')
			expect(formatVersionDeclaration('1.2.0', 'version in ThisBuild', '\r\n')).toBe(
				'\r\nversion in ThisBuild := "1.2.0"\r\n'
			)
		})

		it('should default to the platform separator', () => {
			expect(formatVersionDeclaration('2.0.0')).toBe(`${EOL}version := "2.0.0"${EOL}`)
		})
	})

	describe('parseVersionDeclaration', () => {
		it('should read the version back', () => {
			expect(parseVersionDeclaration('\nversion := "1.2.0"\n')).toBe('1.2.0')
			expect(parseVersionDeclaration('\r\nversion := "1.2.0-SNAPSHOT"\r\n')).toBe('1.2.0-SNAPSHOT')
		})

		it('should honour a custom key', () => {
			const content = 'version in ThisBuild := "0.3.0"'
			expect(parseVersionDeclaration(content, 'version in ThisBuild')).toBe('0.3.0')
			expect(parseVersionDeclaration(content)).toBe(null)
		})

		it('should return null without a declaration', () => {
			expect(parseVersionDeclaration('')).toBe(null)
			expect(parseVersionDeclaration('name := "demo"')).toBe(null)
		})
	})

	describe('readVersionFile / writeVersionFile', () => {
		it('should return null for a missing file', () => {
			expect(readVersionFile(join(TEST_DIR, 'missing.conf'))).toBe(null)
		})

		it('should rewrite rather than append', () => {
			const path = join(TEST_DIR, 'version.conf')
			writeFileSync(path, 'old content that goes away\n')

			writeVersionFile(path, '1.2.0')
			writeVersionFile(path, '1.2.1-SNAPSHOT')

			expect(readFileSync(path, 'utf-8')).toBe(`${EOL}version := "1.2.1-SNAPSHOT"${EOL}`)
			expect(readVersionFile(path)).toBe('1.2.1-SNAPSHOT')
		})

		it('should not leave temp files behind', () => {
			writeVersionFile(join(TEST_DIR, 'version.conf'), '1.0.0')

			expect(readdirSync(TEST_DIR)).toEqual(['version.conf'])
		})
	})
})
