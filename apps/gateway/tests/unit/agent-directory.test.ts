import { AgentCardError } from '../../src/errors/gateway.errors';
import { AgentDirectory } from '../../src/repositories/agent.directory';
import { AGENT_URL, StubAgent, agentRecord } from '../helpers/stub-agent';

describe('AgentDirectory', () => {
    let stub: StubAgent;
    let agents: AgentDirectory;

    beforeEach(() => {
        stub = new StubAgent();
        agents = new AgentDirectory(stub);
    });

    it('registers an agent under its endpoint with the card name', async () => {
        stub.cards.set(AGENT_URL, { name: 'Echo', description: 'repeats things' });

        const agent = await agents.register(AGENT_URL);

        expect(agent.name).toBe('Echo');
        expect(agent.card.description).toBe('repeats things');
        expect(agents.get(AGENT_URL)).toEqual(agent);
        expect(agents.size).toBe(1);
    });

    it('refreshes the card when an endpoint registers again', async () => {
        stub.cards.set(AGENT_URL, { name: 'Echo' });
        await agents.register(AGENT_URL);
        stub.cards.set(AGENT_URL, { name: 'Echo v2' });

        await agents.register(AGENT_URL);

        expect(agents.list().map(a => a.name)).toEqual(['Echo v2']);
    });

    it('does not register an agent whose card cannot be resolved', async () => {
        await expect(agents.register('http://down.test')).rejects.toThrow(AgentCardError);
        expect(agents.has('http://down.test')).toBe(false);
    });

    it('removes an agent and returns it', async () => {
        stub.cards.set(AGENT_URL, { name: 'Echo' });
        await agents.register(AGENT_URL);

        expect(agents.remove(AGENT_URL)?.name).toBe('Echo');
        expect(agents.remove(AGENT_URL)).toBeUndefined();
        expect(agents.list()).toEqual([]);
    });

    it('restores agents keyed by their url', () => {
        agents.restore({ [AGENT_URL]: agentRecord(AGENT_URL, 'Restored') });

        expect(agents.get(AGENT_URL)?.name).toBe('Restored');
        expect(Object.keys(agents.snapshot())).toEqual([AGENT_URL]);
    });
});
