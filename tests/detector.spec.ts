import { detectAgentType, normalizeAgentData } from '../src/services/detector';
import { researcherCrewMember } from './helpers/records';

describe('detectAgentType', () => {
  it.each([
    [{ agent_template_type: 'EinsteinServiceAgent' }, 'agentforce'],
    [{ sub_agents: [] }, 'google-adk'],
    [{ action_groups: [] }, 'bedrock_agents'],
    [{ nodes: [] }, 'n8n'],
    [{ agent_service: {} }, 'llamaindex_agents'],
    [{ agent_config: {} }, 'llamastack'],
    [{ planner: 'sequential' }, 'semantic_kernel'],
    [{ safe_mode: true }, 'mistral_agents'],
    [{ llm_config: {} }, 'autogen'],
    [{ objective: 'grow' }, 'babyagi'],
    [{ swarm_architecture: 'hierarchical' }, 'agentstack'],
    [{ handoffs: [] }, 'swarm'],
    [{ role: 'Researcher', goal: 'find facts' }, 'crewai'],
    [{ agent_type: 'react' }, 'langchain']
  ])('recognizes %j as %s', (input, expected) => {
    expect(detectAgentType(input)).toBe(expected);
  });

  it('lets a declared framework win over fingerprints', () => {
    expect(detectAgentType({ framework: 'langchain', role: 'Researcher', goal: 'find facts' })).toBe('langchain');
    expect(detectAgentType({ agentType: 'swarm', role: 'Researcher', goal: 'find facts' })).toBe('swarm');
  });

  it('falls back to fingerprints when the declared framework is unknown', () => {
    expect(detectAgentType({ framework: 'homegrown', objective: 'grow' })).toBe('babyagi');
  });

  it('returns null for plain descriptions and non-objects', () => {
    expect(detectAgentType({ name: 'Helper', description: 'Answers questions' })).toBeNull();
    expect(detectAgentType(42)).toBeNull();
    expect(detectAgentType(null)).toBeNull();
    expect(detectAgentType([{ role: 'Researcher', goal: 'x' }])).toBeNull();
    expect(detectAgentType('Summarises support tickets every morning')).toBeNull();
  });

  it('recognizes instances by their class names', () => {
    class CrewAgent {}
    class AssistantAgent {}
    class Widget {}
    expect(detectAgentType(new CrewAgent())).toBe('crewai');
    expect(detectAgentType(new AssistantAgent())).toBe('autogen');
    expect(detectAgentType(new Widget())).toBeNull();
  });

  it('parses JSON and YAML strings before detecting', () => {
    expect(detectAgentType('{"role":"Researcher","goal":"find facts"}')).toBe('crewai');
    expect(detectAgentType('swarm_name: Research\nagents:\n  - agent_name: A\n')).toBe('agentstack');
  });
});

describe('normalizeAgentData', () => {
  it('routes to the detected adapter', () => {
    expect(normalizeAgentData(researcherCrewMember).agentType).toBe('crewai');
  });

  it('uses a forced framework without detecting', () => {
    const record = normalizeAgentData(researcherCrewMember, { framework: 'langchain' });
    expect(record.agentType).toBe('langchain');
    expect(record.name).toBe('Unnamed LangChain Agent');
  });

  it('normalizes a YAML string the same way as the parsed mapping', () => {
    const yaml = 'role: Researcher\ngoal: find facts\ntools:\n  - search\nmemory: true\n';
    expect(normalizeAgentData(yaml)).toEqual(normalizeAgentData(researcherCrewMember));
  });

  it('keeps free text as the description of a generic record', () => {
    expect(normalizeAgentData('Summarises support tickets every morning')).toEqual({
      agentType: 'unknown',
      version: '1.0',
      name: 'Unnamed Agent',
      description: 'Summarises support tickets every morning',
      owner: 'Unknown',
      capabilities: [],
      metadata: {},
      trustScore: 75
    });
  });

  it('gives empty text the default description', () => {
    expect(normalizeAgentData('').description).toBe('AI agent');
    expect(normalizeAgentData('   ').description).toBe('AI agent');
  });

  it('copies universal fields and metadata for unrecognized mappings', () => {
    const record = normalizeAgentData({
      name: 'Helper',
      version: '2.1',
      agentType: 'homegrown',
      capabilities: ['search', 'search', '  '],
      metadata: { team: 'ops' }
    });
    expect(record.agentType).toBe('unknown');
    expect(record.name).toBe('Helper');
    expect(record.version).toBe('2.1');
    expect(record.capabilities).toEqual(['search']);
    expect(record.metadata).toEqual({ team: 'ops', declaredAgentType: 'homegrown' });
  });

  it('names unrecognized instances after their class', () => {
    class Widget {}
    const record = normalizeAgentData(new Widget());
    expect(record.name).toBe('Widget Instance');
    expect(record.description).toBe('Widget agent instance');
  });

  it('finishes the record when reading the input throws', () => {
    class Hostile {
      get name(): string {
        throw new Error('boom');
      }
    }
    const record = normalizeAgentData(new Hostile());
    expect(record.agentType).toBe('unknown');
    expect(record.name).toBe('Hostile Instance');
    expect(record.trustScore).toBe(80);
  });

  it.each(['framework', 'nodes', 'deployResult', 'response_format', 'agents'])(
    'falls back to the generic record when reading %s throws during detection',
    (key) => {
      const input = Object.defineProperty({ name: 'Tripwire' }, key, {
        enumerable: true,
        get() {
          throw new Error('boom');
        }
      });
      expect(detectAgentType(input)).toBeNull();
      expect(() => normalizeAgentData(input)).not.toThrow();
      expect(normalizeAgentData(input).agentType).toBe('unknown');
    }
  );
});
