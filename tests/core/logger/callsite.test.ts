import { describe, it, expect } from 'vitest'

import {
    parseStack,
    captureCallSite,
    errorOrigin,
    formatLocation,
    formatTrace,
} from '../../../src/core/logger/callsite.js'


const STACK = [
    'Error: boom',
    '    at connect (/app/db.ts:10:5)',
    '    at /app/main.ts:4:11',
    '    at new Promise (<anonymous>)',
    '    at run (file:///app/run.ts:20:3)',
].join('\n')


function errorWithStack(stack: string): Error {

    const error = new Error('boom')
    error.stack = stack

    return error
}


describe('logger: callsite', () => {

    describe('parseStack', () => {

        it('should parse named and anonymous frames', () => {

            expect(parseStack(STACK)).toEqual([
                { file: '/app/db.ts', line: 10, column: 5, function: 'connect' },
                { file: '/app/main.ts', line: 4, column: 11, function: null },
                { file: '/app/run.ts', line: 20, column: 3, function: 'run' },
            ])
        })

        it('should return nothing for a missing stack', () => {

            expect(parseStack(undefined)).toEqual([])
            expect(parseStack('Error: no frames')).toEqual([])
        })
    })

    describe('errorOrigin', () => {

        it('should use the top frame', () => {

            expect(errorOrigin(errorWithStack(STACK))).toEqual({
                file: '/app/db.ts',
                line: 10,
                function: 'connect',
            })
        })

        it('should return null without frames', () => {

            expect(errorOrigin(errorWithStack('Error: boom'))).toBeNull()
        })
    })

    describe('captureCallSite', () => {

        it('should report the calling test file', () => {

            const location = captureCallSite()

            expect(location?.file).toMatch(/callsite\.test\.ts$/)
            expect(location?.line).toBeGreaterThan(0)
        })
    })

    describe('formatLocation', () => {

        it('should render file and line', () => {

            expect(formatLocation({ file: 'app.ts', line: 12 })).toBe('app.ts(12)')
        })

        it('should append the function name', () => {

            expect(formatLocation({ file: 'app.ts', line: 12, function: 'main' })).toBe('app.ts(12): main')
        })

        it('should render empty parts', () => {

            expect(formatLocation(null)).toBe('()')
            expect(formatLocation({ file: 'app.ts', line: null })).toBe('app.ts()')
        })
    })

    describe('formatTrace', () => {

        it('should number frames and close with main', () => {

            expect(formatTrace(errorWithStack(STACK))).toBe([
                '#0 /app/db.ts(10): connect',
                '#1 /app/main.ts(4): {closure}',
                '#2 /app/run.ts(20): run',
                '#3 {main}',
            ].join('\n'))
        })

        it('should still close a trace without frames', () => {

            expect(formatTrace(errorWithStack('Error: boom'))).toBe('#0 {main}')
        })
    })
})
