import {createStructuredLogger, runWithLogContext} from '@edge-router/logging';
import {describe, expect, it} from 'vitest';

import {createPipelineTracker} from '../index';

describe('createPipelineTracker', () => {
  it('moves forward through the stages and records them', () => {
    const tracker = createPipelineTracker();

    expect(tracker.current).toBeNull();
    tracker.advance('authenticating');
    tracker.advance('classifying');
    tracker.advance('routing');

    expect(tracker.current).toBe('routing');
    expect(tracker.history).toEqual(['authenticating', 'classifying', 'routing']);
  });

  it('allows skipping ahead', () => {
    const tracker = createPipelineTracker();

    tracker.advance('routing');
    tracker.advance('done');

    expect(tracker.history).toEqual(['routing', 'done']);
  });

  it('rejects backward and repeated steps', () => {
    const tracker = createPipelineTracker();
    tracker.advance('forwarding');

    expect(() => tracker.advance('translating')).toThrow('Pipeline cannot move from forwarding to translating');
    expect(() => tracker.advance('forwarding')).toThrow('Pipeline cannot move from forwarding to forwarding');
    expect(tracker.current).toBe('forwarding');
  });

  it('logs each stage at debug level', () => {
    const lines: Record<string, unknown>[] = [];
    const stream = {
      write: (chunk: string | Uint8Array) => {
        lines.push(JSON.parse(String(chunk)) as Record<string, unknown>);
        return true;
      }
    };
    const logger = createStructuredLogger({
      service: 'edge-router',
      env: 'test',
      level: 'info',
      writer: {stdout: stream, stderr: stream}
    });

    runWithLogContext({correlation_id: 'corr-quiet', log_level: 'info'}, () => {
      createPipelineTracker({logger}).advance('authenticating');
    });
    runWithLogContext({correlation_id: 'corr-debug', log_level: 'debug'}, () => {
      const tracker = createPipelineTracker({logger});
      tracker.advance('authenticating');
      tracker.advance('classifying');
    });

    expect(lines.map(line => line.metadata)).toEqual([
      {stage: 'authenticating', previous_stage: null},
      {stage: 'classifying', previous_stage: 'authenticating'}
    ]);
    expect(lines.every(line => line.event === 'pipeline.stage' && line.correlation_id === 'corr-debug')).toBe(true);
  });
});
