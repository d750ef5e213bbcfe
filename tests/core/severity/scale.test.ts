import { describe, it, expect } from 'vitest'

import {
    SEVERITIES,
    Severity,
    severityOrdinal,
    severityLabel,
    parseThreshold,
    UnknownSeverityError,
} from '../../../src/core/severity/index.js'


describe('severity: scale', () => {

    describe('severityOrdinal', () => {

        it('should pass numbers through unchanged', () => {

            expect(severityOrdinal(0)).toBe(0)
            expect(severityOrdinal(7)).toBe(7)
            expect(severityOrdinal(42)).toBe(42)
        })

        it('should resolve full names', () => {

            SEVERITIES.forEach((name, index) => {

                expect(severityOrdinal(name)).toBe(index)
            })
        })

        it('should resolve prefixes case-insensitively', () => {

            expect(severityOrdinal('err')).toBe(3)
            expect(severityOrdinal('ERR')).toBe(3)
            expect(severityOrdinal('info')).toBe(6)
            expect(severityOrdinal('Warn')).toBe(4)
            expect(severityOrdinal('crit')).toBe(2)
        })

        it('should take the first match in rank order', () => {

            expect(severityOrdinal('e')).toBe(0)
            expect(severityOrdinal('d')).toBe(7)
        })

        it('should throw for names that match nothing', () => {

            expect(() => severityOrdinal('bogus')).toThrow(UnknownSeverityError)
            expect(() => severityOrdinal('bogus')).toThrow('Unknown severity: bogus')
        })
    })

    describe('severityLabel', () => {

        it('should return the name for each ordinal', () => {

            expect(severityLabel(0)).toBe('emergency')
            expect(severityLabel(3)).toBe('error')
            expect(severityLabel(7)).toBe('debug')
        })

        it('should round-trip with severityOrdinal', () => {

            for (let i = 0; i < SEVERITIES.length; i++) {

                expect(severityOrdinal(severityLabel(i))).toBe(i)
            }
        })

        it('should throw outside the scale', () => {

            expect(() => severityLabel(-1)).toThrow(UnknownSeverityError)
            expect(() => severityLabel(8)).toThrow(UnknownSeverityError)
            expect(() => severityLabel(1.5)).toThrow(UnknownSeverityError)
        })
    })

    describe('parseThreshold', () => {

        it('should accept off in any case', () => {

            expect(parseThreshold('off')).toBe(Severity.OFF)
            expect(parseThreshold('OFF')).toBe(Severity.OFF)
            expect(parseThreshold(-1)).toBe(Severity.OFF)
        })

        it('should resolve names and ordinals', () => {

            expect(parseThreshold('warning')).toBe(4)
            expect(parseThreshold(6)).toBe(6)
        })

        it('should reject ordinals outside the scale', () => {

            expect(() => parseThreshold(9)).toThrow(UnknownSeverityError)
            expect(() => parseThreshold(-2)).toThrow(UnknownSeverityError)
        })
    })
})
