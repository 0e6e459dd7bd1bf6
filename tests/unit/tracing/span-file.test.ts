import { describe, expect, it } from 'vitest'
import { SpanFileError } from '../../../src/core/errors.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import { loadSpanFile, parseSpanFile } from '../../../src/tracing/span-file.js'

const SNAPSHOT = {
    id: '00-0af7651916cd43dd8448eb211c80319c-00f067aa0ba902b7-01',
    operationName: 'SELECT orders',
    startTime: '2024-01-15T10:30:45Z',
    duration: 12.5,
    kind: 'Client',
    status: 'Error',
    baggage: { userId: '42', tenant: null },
    tags: [
        ['db.rows', 12],
        ['db.rows', 13],
    ],
    events: [{ name: 'retry', timestamp: '2024-01-15T10:31:00+02:00', tags: { attempt: 2 } }],
    customProperties: { requestPath: '/orders/7' },
    parent: {
        id: '00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01',
        operationName: 'GET /orders',
    },
}

describe('parseSpanFile', () => {
    it('builds a span record', () => {
        const span = parseSpanFile(SNAPSHOT)
        expect(span.operationName).toBe('SELECT orders')
        expect(span.startTime?.toISOString()).toBe('2024-01-15T10:30:45.000Z')
        expect(span.duration).toBe(12.5)
        expect(span.kind).toBe('Client')
        expect(span.traceFlags).toBe('None')
        expect(span.baggage).toEqual([
            ['userId', '42'],
            ['tenant', undefined],
        ])
        expect(span.tags).toEqual([
            ['db.rows', 12],
            ['db.rows', 13],
        ])
        expect(span.events[0]?.timestamp.toISOString()).toBe('2024-01-15T08:31:00.000Z')
        expect(span.events[0]?.tags).toEqual([['attempt', 2]])
        expect(span.getCustomProperty('requestPath')).toBe('/orders/7')
        expect(span.parent?.operationName).toBe('GET /orders')
    })

    it('lists validation issues', () => {
        try {
            parseSpanFile({ kind: 'Sideways', parent: { operationName: 3 } })
            expect.unreachable()
        } catch (error) {
            expect(error).toBeInstanceOf(SpanFileError)
            if (!(error instanceof SpanFileError)) return
            expect(error.issues.some((issue) => issue.startsWith('operationName:'))).toBe(true)
            expect(error.issues.some((issue) => issue.startsWith('kind:'))).toBe(true)
            expect(error.issues.some((issue) => issue.startsWith('parent.operationName:'))).toBe(true)
        }
    })

    it('rejects timestamps that are not ISO-8601', () => {
        expect(() => parseSpanFile({ operationName: 'op', startTime: 'yesterday' })).toThrow(SpanFileError)
    })
})

describe('loadSpanFile', () => {
    it('reads JSON through the file system', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/spans/order.json', JSON.stringify(SNAPSHOT))
        const span = await loadSpanFile(fs, '/spans/order.json')
        expect(span.id).toBe(SNAPSHOT.id)
    })

    it('wraps read failures', async () => {
        const fs = new MockFileSystem()
        await expect(loadSpanFile(fs, '/spans/missing.json')).rejects.toThrow('Cannot read span file /spans/missing.json')
    })
})
