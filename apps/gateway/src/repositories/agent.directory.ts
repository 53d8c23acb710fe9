import { AgentRecord } from '../db/agent.entity';
import { AgentCardResolver } from '../services/remote-invoker';

const TAG = '[agents]';

export class AgentDirectory {
    private agents = new Map<string, AgentRecord>();

    constructor(private readonly resolver: AgentCardResolver) { }

    get size(): number {
        return this.agents.size;
    }

    // Re-registering an endpoint refreshes its card and keeps its tasks.
    async register(url: string): Promise<AgentRecord> {
        const card = await this.resolver.resolveCard(url);
        const agent: AgentRecord = { url, name: card.name, card, registered_at: new Date() };
        this.agents.set(url, agent);
        console.log(`${TAG} registered '${agent.name}' at ${url}`);
        return agent;
    }

    get(url: string): AgentRecord | undefined {
        return this.agents.get(url);
    }

    has(url: string): boolean {
        return this.agents.has(url);
    }

    list(): AgentRecord[] {
        return Array.from(this.agents.values());
    }

    remove(url: string): AgentRecord | undefined {
        const agent = this.agents.get(url);
        if (!agent) return undefined;

        this.agents.delete(url);
        console.log(`${TAG} unregistered '${agent.name}' at ${url}`);
        return agent;
    }

    snapshot(): Record<string, AgentRecord> {
        return Object.fromEntries(this.agents.entries());
    }

    restore(records: Record<string, AgentRecord>): void {
        this.agents.clear();
        for (const [url, agent] of Object.entries(records)) {
            this.agents.set(url, { ...agent, url });
        }
        console.log(`${TAG} restored ${this.agents.size} agents`);
    }
}
