import type { Agent } from './types.js'
import { UnknownAgentError } from './errors.js'

export class AgentRegistry {
  private agents = new Map<string, Agent>()

  constructor(agents: Agent[] = []) {
    for (const agent of agents) this.register(agent)
  }

  register(agent: Agent): void {
    if (this.agents.has(agent.id)) {
      throw new Error(`Agent ${agent.id} is already registered`)
    }
    this.agents.set(agent.id, agent)
  }

  has(agentId: string, task?: string): boolean {
    const agent = this.agents.get(agentId)
    if (!agent) return false
    return task === undefined || agent.tasks.includes(task)
  }

  resolve(agentId: string, task: string): Agent {
    const agent = this.agents.get(agentId)
    if (!agent) throw new UnknownAgentError(agentId)
    if (!agent.tasks.includes(task)) throw new UnknownAgentError(agentId, task)
    return agent
  }

  list(): Array<{ id: string; tasks: string[] }> {
    return [...this.agents.values()].map(agent => ({ id: agent.id, tasks: [...agent.tasks] }))
  }
}
