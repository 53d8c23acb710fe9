import * as grpc from '@grpc/grpc-js';
import { taskState } from '../../src/db/task.entity';
import { AgentCardError, AgentNotRegisteredError, TaskNotFoundError } from '../../src/errors/gateway.errors';
import { parseListRequest, toAgentDescriptor, toServiceError, toTaskSnapshot } from '../../src/grpc/gateway.service';
import { agentRecord } from '../helpers/stub-agent';

describe('gateway gRPC mapping', () => {
    describe('parseListRequest', () => {
        it('defaults to every task, newest first', () => {
            expect(parseListRequest({ state: '', sort: '', limit: 0 })).toEqual({ sort: 'descending' });
        });

        it('accepts state and sort in any case', () => {
            expect(parseListRequest({ state: 'COMPLETED', sort: 'Ascending', limit: 2 })).toEqual({
                state: taskState.COMPLETED,
                sort: 'ascending',
                limit: 2,
            });
        });

        it.each([
            [{ state: 'done', sort: '', limit: 0 }, 'unknown state: done'],
            [{ state: '', sort: 'sideways', limit: 0 }, 'unknown sort order: sideways'],
            [{ state: '', sort: '', limit: -1 }, 'limit must not be negative'],
        ])('rejects %p', (request, message) => {
            expect(() => parseListRequest(request)).toThrow(message);
        });
    });

    describe('toTaskSnapshot', () => {
        const createdAt = new Date('2026-03-01T10:00:00.000Z');

        it('sends absent values as empty strings and bytes', () => {
            const snapshot = toTaskSnapshot({
                gateway_id: 'gw-1',
                agent_id: null,
                endpoint: 'http://agent.test',
                request_payload: 'hi',
                session_id: null,
                state: taskState.PENDING,
                result: null,
                created_at: createdAt,
                updated_at: createdAt,
            });

            expect(snapshot.agent_id).toBe('');
            expect(snapshot.session_id).toBe('');
            expect(snapshot.result.length).toBe(0);
            expect(snapshot.created_at).toBe('2026-03-01T10:00:00.000Z');
        });

        it('encodes the result as JSON bytes', () => {
            const snapshot = toTaskSnapshot({
                gateway_id: 'gw-1',
                agent_id: 'remote-1',
                endpoint: 'http://agent.test',
                request_payload: 'hi',
                session_id: 'ctx-1',
                state: taskState.COMPLETED,
                result: { message: 'hello', artifacts: [] },
                created_at: createdAt,
                updated_at: createdAt,
            });

            expect(JSON.parse(snapshot.result.toString('utf-8'))).toEqual({ message: 'hello', artifacts: [] });
            expect(snapshot.state).toBe('completed');
        });
    });

    it('encodes the agent card as JSON bytes', () => {
        const descriptor = toAgentDescriptor(agentRecord('http://agent.test', 'Echo'));

        expect(JSON.parse(descriptor.card.toString('utf-8'))).toEqual({ name: 'Echo' });
        expect(descriptor.registered_at).toBe('2026-01-01T00:00:00.000Z');
    });

    describe('toServiceError', () => {
        it.each([
            [new TaskNotFoundError('gw-1'), grpc.status.NOT_FOUND],
            [new AgentNotRegisteredError('http://agent.test'), grpc.status.NOT_FOUND],
            [new AgentCardError('http://agent.test', 'HTTP 404'), grpc.status.UNAVAILABLE],
            [new Error('boom'), grpc.status.INTERNAL],
        ])('maps %s', (error, code) => {
            const serviceError = toServiceError(error);
            expect(serviceError.code).toBe(code);
            expect(serviceError.message).toBe(error.message);
        });
    });
});
