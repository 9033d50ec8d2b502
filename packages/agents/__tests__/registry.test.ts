import { describe, it, expect } from 'vitest'
import { AgentRegistry } from '../src/registry.js'
import { UnknownAgentError } from '../src/errors.js'
import type { Agent } from '../src/types.js'

function stubAgent(id: string, tasks: string[]): Agent {
  return {
    id,
    tasks,
    execute: async () => ({ success: true }),
  }
}

describe('AgentRegistry', () => {
  it('resolves a registered agent for one of its tasks', () => {
    const agent = stubAgent('qa_agent', ['validate_extracted_data'])
    const registry = new AgentRegistry([agent])

    expect(registry.resolve('qa_agent', 'validate_extracted_data')).toBe(agent)
    expect(registry.has('qa_agent')).toBe(true)
    expect(registry.has('qa_agent', 'validate_extracted_data')).toBe(true)
    expect(registry.has('qa_agent', 'deliver_data')).toBe(false)
  })

  it('rejects duplicate registrations', () => {
    const registry = new AgentRegistry([stubAgent('qa_agent', ['a'])])
    expect(() => registry.register(stubAgent('qa_agent', ['b']))).toThrow('Agent qa_agent is already registered')
  })

  it('throws UnknownAgentError for unknown agents and tasks', () => {
    const registry = new AgentRegistry([stubAgent('qa_agent', ['a'])])

    expect(() => registry.resolve('ghost', 'a')).toThrow(UnknownAgentError)
    expect(() => registry.resolve('qa_agent', 'b')).toThrow('Agent qa_agent is not registered for task b')
  })

  it('lists agents with a copy of their tasks', () => {
    const registry = new AgentRegistry([stubAgent('a', ['x']), stubAgent('b', ['y', 'z'])])
    const listed = registry.list()
    listed[0].tasks.push('mutated')

    expect(registry.list()).toEqual([
      { id: 'a', tasks: ['x'] },
      { id: 'b', tasks: ['y', 'z'] },
    ])
  })
})
