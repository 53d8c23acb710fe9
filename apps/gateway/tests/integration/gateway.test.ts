import { taskState } from '../../src/db/task.entity';
import { AgentNotRegisteredError } from '../../src/errors/gateway.errors';
import { Gateway } from '../../src/services/gateway';
import { PENDING_PLACEHOLDER } from '../../src/services/dispatch-coordinator';
import { sleep, waitUntil } from '../helpers/poll';
import { AGENT_URL, StubAgent, messageReply, taskReply } from '../helpers/stub-agent';

const OTHER_URL = 'http://other-agent.test';

describe('Gateway', () => {
    let stub: StubAgent;
    let gateway: Gateway;

    beforeEach(async () => {
        stub = new StubAgent();
        stub.cards.set(AGENT_URL, { name: 'Echo' });
        stub.cards.set(OTHER_URL, { name: 'Other' });
        gateway = new Gateway(stub, { immediateResponseTimeoutMs: 50, pollIntervalMs: 10, maxPolls: 100 });
        await gateway.registerAgent(AGENT_URL);
    });

    afterEach(async () => {
        await gateway.shutdown();
    });

    it('answers a quick agent in the same call', async () => {
        stub.onSend = async (_agent, params) => messageReply(params.text === 'hi' ? 'hello' : '?');

        const task = await gateway.sendMessage(AGENT_URL, 'hi');

        expect(task.state).toBe(taskState.COMPLETED);
        expect(task.result?.message).toBe('hello');
        expect((await gateway.getTaskResult(task.gateway_id)).result?.message).toBe('hello');
    });

    it('returns pending for a slow agent and completes it in the background', async () => {
        stub.onSend = async () => {
            await sleep(150);
            return messageReply('done');
        };

        const task = await gateway.sendMessage(AGENT_URL, 'take your time');
        expect(task.state).toBe(taskState.PENDING);
        expect(task.result?.message).toBe(PENDING_PLACEHOLDER);

        await waitUntil(() => gateway.tasks.get(task.gateway_id)?.state === taskState.COMPLETED);

        const finished = await gateway.getTaskResult(task.gateway_id);
        expect(finished.result?.message).toBe('done');
        expect(finished.gateway_id).toBe(task.gateway_id);
    });

    it('follows a long-running remote task to completion', async () => {
        let polls = 0;
        stub.onSend = async () => taskReply('remote-7', 'working');
        stub.onGet = async (_agent, taskId) => {
            polls++;
            return polls < 2
                ? taskReply(taskId, 'working', { artifacts: [{ name: 'partial', text: 'part 1' }] })
                : taskReply(taskId, 'completed', { message: 'all done', artifacts: [{ name: 'partial', text: 'part 1' }, { name: 'final', text: 'part 2' }] });
        };

        const task = await gateway.sendMessage(AGENT_URL, 'long job');
        expect(task.state).toBe(taskState.RUNNING);

        await waitUntil(() => gateway.tasks.get(task.gateway_id)?.state === taskState.COMPLETED);

        const finished = await gateway.getTaskResult(task.gateway_id);
        expect(finished.agent_id).toBe('remote-7');
        expect(finished.result?.artifacts.map(a => a.name)).toEqual(['partial', 'final']);
    });

    it('lists tasks by state, newest first, limited', async () => {
        stub.onSend = async (_agent, params) => messageReply(`re: ${params.text}`);
        const first = await gateway.sendMessage(AGENT_URL, 'one');
        const second = await gateway.sendMessage(AGENT_URL, 'two');
        const third = await gateway.sendMessage(AGENT_URL, 'three');

        stub.onSend = async () => taskReply('remote-1', 'working');
        await gateway.sendMessage(AGENT_URL, 'four');

        const listed = gateway.getTaskList({ state: taskState.COMPLETED, sort: 'descending', limit: 2 });
        expect(listed.map(t => t.gateway_id)).toEqual([third.gateway_id, second.gateway_id]);

        const oldestFirst = gateway.getTaskList({ state: taskState.COMPLETED, sort: 'ascending' });
        expect(oldestFirst.map(t => t.gateway_id)).toEqual([first.gateway_id, second.gateway_id, third.gateway_id]);
    });

    it('cancels a running task', async () => {
        stub.onSend = async () => taskReply('remote-1', 'working');
        const task = await gateway.sendMessage(AGENT_URL, 'long job');

        const cancelled = await gateway.cancelTask(task.gateway_id);

        expect(cancelled.state).toBe(taskState.CANCELLED);
        expect(stub.cancels).toEqual(['remote-1']);
        await gateway.reconciler.wait(task.gateway_id);
        expect(gateway.tasks.get(task.gateway_id)?.state).toBe(taskState.CANCELLED);
    });

    it('removes an agent together with its tasks', async () => {
        await gateway.registerAgent(OTHER_URL);
        stub.onSend = async () => taskReply('remote-1', 'working');
        const running = await gateway.sendMessage(AGENT_URL, 'long job');
        stub.onSend = async () => messageReply('kept');
        const kept = await gateway.sendMessage(OTHER_URL, 'hi');

        const outcome = gateway.unregisterAgent(AGENT_URL);

        expect(outcome).toEqual({ url: AGENT_URL, name: 'Echo', removedTasks: 1 });
        await gateway.reconciler.wait(running.gateway_id);
        expect(gateway.reconciler.outstandingCount).toBe(0);
        await expect(gateway.getTaskResult(running.gateway_id)).rejects.toThrow('Task ID not found');
        expect(gateway.getTaskList().map(t => t.gateway_id)).toEqual([kept.gateway_id]);
        expect(gateway.listAgents().map(a => a.url)).toEqual([OTHER_URL]);
    });

    it('refuses to unregister an unknown agent', () => {
        expect(() => gateway.unregisterAgent('http://nobody.test')).toThrow(AgentNotRegisteredError);
    });

    it('rejects messages for unregistered endpoints with a stored error', async () => {
        const task = await gateway.sendMessage('http://nobody.test', 'hi');

        expect(task.state).toBe(taskState.ERROR);
        expect((await gateway.getTaskResult(task.gateway_id)).result?.error?.code).toBe('AGENT_NOT_REGISTERED');
    });

    it('restores snapshots and resumes unfinished tasks', async () => {
        stub.onSend = async () => taskReply('remote-1', 'working');
        const task = await gateway.sendMessage(AGENT_URL, 'long job');
        const snapshot = gateway.snapshot();
        await gateway.shutdown();

        const restored = new Gateway(stub, { immediateResponseTimeoutMs: 50, pollIntervalMs: 10, maxPolls: 100 });
        stub.onGet = async (_agent, taskId) => taskReply(taskId, 'completed', { message: 'finished after restart' });
        restored.restore(snapshot);

        expect(restored.reconciler.isTracking(task.gateway_id)).toBe(true);
        await restored.reconciler.wait(task.gateway_id);
        expect(restored.tasks.get(task.gateway_id)?.result?.message).toBe('finished after restart');
        await restored.shutdown();
    });

    it('drops restored tasks whose agent is gone', async () => {
        stub.onSend = async () => messageReply('done');
        await gateway.sendMessage(AGENT_URL, 'hi');
        const snapshot = gateway.snapshot();

        const restored = new Gateway(stub, { immediateResponseTimeoutMs: 50, pollIntervalMs: 10, maxPolls: 100 });
        restored.restore({ agents: {}, tasks: snapshot.tasks });

        expect(restored.tasks.size).toBe(0);
    });
});
