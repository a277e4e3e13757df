import { describe, it, expect } from 'vitest'
import fc from 'fast-check'
import { isValidPort, parsePort, parsePid, MIN_PORT, MAX_PORT } from './port.js'

describe('Port utilities', () => {
	describe('isValidPort', () => {
		it('should accept the boundaries of the TCP port range', () => {
			expect(isValidPort(MIN_PORT)).toBe(true)
			expect(isValidPort(MAX_PORT)).toBe(true)
		})

		it('should reject zero, negative, fractional and out-of-range values', () => {
			expect(isValidPort(0)).toBe(false)
			expect(isValidPort(-80)).toBe(false)
			expect(isValidPort(80.5)).toBe(false)
			expect(isValidPort(65536)).toBe(false)
			expect(isValidPort(Number.NaN)).toBe(false)
		})

		it('should accept every integer in range (property-based)', () => {
			fc.assert(
				fc.property(fc.integer({ min: MIN_PORT, max: MAX_PORT }), (port) => {
					expect(isValidPort(port)).toBe(true)
				})
			)
		})
	})

	describe('parsePort', () => {
		it('should parse a numeric string', () => {
			expect(parsePort('3000')).toBe(3000)
			expect(parsePort(' 8080 ')).toBe(8080)
		})

		it('should reject non-numeric input', () => {
			expect(() => parsePort('abc')).toThrow('Invalid port "abc": expected an integer between 1 and 65535')
			expect(() => parsePort('30.5')).toThrow('Invalid port "30.5": expected an integer between 1 and 65535')
			expect(() => parsePort('-1')).toThrow('Invalid port "-1": expected an integer between 1 and 65535')
		})

		it('should reject ports outside the TCP range', () => {
			expect(() => parsePort('0')).toThrow('Invalid port 0: must be between 1 and 65535')
			expect(() => parsePort('70000')).toThrow('Invalid port 70000: must be between 1 and 65535')
		})

		it('should round-trip any valid port (property-based)', () => {
			fc.assert(
				fc.property(fc.integer({ min: MIN_PORT, max: MAX_PORT }), (port) => {
					expect(parsePort(String(port))).toBe(port)
				})
			)
		})
	})

	describe('parsePid', () => {
		it('should parse a positive integer', () => {
			expect(parsePid('4242')).toBe(4242)
		})

		it.each(['0', '-5', 'abc', '', '12.5'])('should reject %j', (value) => {
			expect(() => parsePid(value)).toThrow(`Invalid PID "${value}": expected a positive integer`)
		})
	})
})
