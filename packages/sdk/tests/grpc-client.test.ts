import { parseAgentDescriptor, parseTaskSnapshot } from '../src/grpc-client';

function wireTask(overrides: Record<string, unknown> = {}) {
    return {
        gateway_id: 'g-1',
        agent_id: '',
        endpoint: 'http://agent.test',
        state: 'pending',
        request_payload: 'hi',
        session_id: '',
        result: Buffer.from(''),
        created_at: '2026-03-01T10:00:00.000Z',
        updated_at: '2026-03-01T10:00:01.000Z',
        ...overrides,
    };
}

describe('parseTaskSnapshot', () => {
    it('maps empty proto fields to null', () => {
        const task = parseTaskSnapshot(wireTask());

        expect(task.agent_id).toBeNull();
        expect(task.session_id).toBeNull();
        expect(task.result).toBeNull();
        expect(task.created_at.toISOString()).toBe('2026-03-01T10:00:00.000Z');
        expect(task.updated_at.toISOString()).toBe('2026-03-01T10:00:01.000Z');
    });

    it('decodes the JSON result bytes', () => {
        const result = {
            message: 'hello',
            artifacts: [{ name: 'report', contents: [{ type: 'text', text: 'body' }] }],
        };
        const task = parseTaskSnapshot(wireTask({
            state: 'completed',
            agent_id: 'remote-7',
            session_id: 'ctx-1',
            result: Buffer.from(JSON.stringify(result)),
        }));

        expect(task.state).toBe('completed');
        expect(task.agent_id).toBe('remote-7');
        expect(task.session_id).toBe('ctx-1');
        expect(task.result).toEqual(result);
    });

    it('rejects unknown states', () => {
        expect(() => parseTaskSnapshot(wireTask({ state: 'done' }))).toThrow();
    });

    it('rejects results that do not match the task result shape', () => {
        const bad = Buffer.from(JSON.stringify({ message: 3 }));
        expect(() => parseTaskSnapshot(wireTask({ result: bad }))).toThrow();
    });
});

describe('parseAgentDescriptor', () => {
    it('decodes the card bytes', () => {
        const agent = parseAgentDescriptor({
            url: 'http://agent.test',
            name: 'Echo',
            card: Buffer.from(JSON.stringify({ name: 'Echo', version: '1.0.0' })),
            registered_at: '2026-03-01T09:00:00.000Z',
        });

        expect(agent.card).toEqual({ name: 'Echo', version: '1.0.0' });
        expect(agent.registered_at.toISOString()).toBe('2026-03-01T09:00:00.000Z');
    });
});
