import http from 'http';
import { A2AHttpInvoker } from '../../src/services/remote-invoker';
import { waitUntil } from '../helpers/poll';
import { agentRecord } from '../helpers/stub-agent';

// A loopback agent that sends headers and part of a body, then stalls.
describe('A2AHttpInvoker against a stalled agent', () => {
    let server: http.Server;
    let baseUrl: string;
    let requests: number;
    let contentType: string;
    let partialBody: string;

    beforeAll(async () => {
        server = http.createServer((_req, res) => {
            requests++;
            res.writeHead(200, { 'content-type': contentType });
            res.write(partialBody);
        });
        await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
        const address = server.address();
        if (address === null || typeof address === 'string') throw new Error('loopback agent has no port');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    beforeEach(() => {
        requests = 0;
        contentType = 'application/json';
        partialBody = '{"jsonrpc":"2.0",';
    });

    afterEach(() => {
        server.closeAllConnections();
    });

    afterAll(async () => {
        await new Promise<void>(resolve => server.close(() => resolve()));
    });

    it('times out while the body is still arriving', async () => {
        const invoker = new A2AHttpInvoker({ timeoutMs: 100 });

        await expect(invoker.getTask(agentRecord(baseUrl), 'remote-1')).rejects.toThrow(
            `request to ${baseUrl} timed out after 100ms`,
        );
        expect(requests).toBe(1);
    });

    it('rejects with the abort reason when the caller aborts during the body', async () => {
        const invoker = new A2AHttpInvoker({ timeoutMs: 5000 });
        const controller = new AbortController();

        const call = invoker.getTask(agentRecord(baseUrl), 'remote-1', undefined, controller.signal);
        await waitUntil(() => requests === 1);
        controller.abort(new Error('gateway shutting down'));

        await expect(call).rejects.toThrow('gateway shutting down');
    });

    it('gives up on an event stream that goes quiet', async () => {
        contentType = 'text/event-stream';
        partialBody = 'data: {"result":{"kind":"status-update","taskId":"r1","status":{"state":"working"}}}\n\n';
        const invoker = new A2AHttpInvoker({ timeoutMs: 100 });
        const seen: unknown[] = [];

        const consume = async () => {
            for await (const event of invoker.streamMessage(agentRecord(baseUrl), { gatewayId: 'gw-1', text: 'hi', sessionId: null })) {
                seen.push(event);
            }
        };

        await expect(consume()).rejects.toThrow(`stream from ${baseUrl} idle for more than 100ms`);
        expect(seen).toEqual([{ result: { kind: 'status-update', taskId: 'r1', status: { state: 'working' } } }]);
    });
});
