import { describe, it, expect, vi, afterEach } from 'vitest';
import { createDebugObserver, type DebugEvent } from '../../src/observability/DebugObserver.js';

// ============================================================================
// DebugObserver Tests
// ============================================================================

describe('createDebugObserver', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should return a custom handler unchanged', () => {
        const events: DebugEvent[] = [];
        const handler = (event: DebugEvent): void => { events.push(event); };
        const observer = createDebugObserver(handler);
        expect(observer).toBe(handler);
    });

    it('should print compact lines by default', () => {
        const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
        const observer = createDebugObserver();

        observer({ type: 'adapt', source: 'function', model: 'get_weather', durationMs: 0.42, timestamp: 0 });
        observer({ type: 'canonicalize', model: 'get_weather', properties: 3, durationMs: 1, timestamp: 0 });
        observer({ type: 'synthesize', model: 'get_weather', fields: 3, durationMs: 2.2, timestamp: 0 });
        observer({ type: 'validate', model: 'get_weather', valid: false, errorCount: 2, durationMs: 0.1, timestamp: 0 });
        observer({ type: 'validate', model: 'get_weather', valid: false, errorCount: 1, durationMs: 0.1, timestamp: 0 });
        observer({ type: 'validate', model: 'get_weather', valid: true, errorCount: 0, durationMs: 0.1, timestamp: 0 });
        observer({ type: 'error', model: 'get_weather', step: 'execute', error: 'boom', timestamp: 0 });

        expect(spy.mock.calls.map(call => call[0])).toEqual([
            '[toolshape] adapt     get_weather (function) 0.4ms',
            '[toolshape] schema    get_weather 3 properties 1.0ms',
            '[toolshape] model     get_weather 3 fields 2.2ms',
            '[toolshape] validate  get_weather ✗ 2 errors 0.1ms',
            '[toolshape] validate  get_weather ✗ 1 error 0.1ms',
            '[toolshape] validate  get_weather ✓ 0.1ms',
            '[toolshape] ERROR     get_weather [execute] boom',
        ]);
    });
});
