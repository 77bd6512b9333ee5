import { agentforceAdapter } from '../src/adapters/agentforce';
import { autogenAdapter } from '../src/adapters/autogen';
import { babyagiAdapter } from '../src/adapters/babyagi';
import { bedrockAgentsAdapter } from '../src/adapters/bedrockAgents';
import { googleAdkAdapter } from '../src/adapters/googleAdk';
import { langchainAdapter } from '../src/adapters/langchain';
import { llamaindexAgentsAdapter } from '../src/adapters/llamaindexAgents';
import { llamastackAdapter } from '../src/adapters/llamastack';
import { mistralAgentsAdapter } from '../src/adapters/mistralAgents';
import { n8nAdapter } from '../src/adapters/n8n';
import { semanticKernelAdapter } from '../src/adapters/semanticKernel';

describe('langchain adapter', () => {
  it('derives name and description from agent type and prompt', () => {
    const prompt = 'You are a research assistant that answers questions using web search and careful arithmetic.';
    const record = langchainAdapter.normalize({
      agent_type: 'zero-shot-react-description',
      llm: 'gpt-4',
      tools: ['search'],
      prompt
    });
    expect(record.name).toBe('LangChain zero-shot-react-description Agent');
    expect(record.description).toBe(`${prompt}...`);
    expect(record.capabilities).toEqual(['llm:gpt-4', 'tool:search']);
    expect(record.metadata.hasPrompt).toBe(true);
    expect(record.trustScore).toBe(92);
  });

  it('reads agent executors and their memory', () => {
    class BufferMemory {}
    class AgentExecutor {
      lc_namespace = ['langchain', 'agents'];
      tools = [{ name: 'calculator' }];
      memory = new BufferMemory();
      callbacks = [{}];
    }
    const record = langchainAdapter.normalize(new AgentExecutor());
    expect(record.capabilities).toEqual(['callbacks:enabled', 'memory:enabled', 'tool:calculator']);
    expect(record.metadata.memoryType).toBe('BufferMemory');
    expect(record.metadata.agentClass).toBe('AgentExecutor');
  });
});

describe('autogen adapter', () => {
  const coder = {
    name: 'Coder',
    system_message: 'You write and run shell scripts.',
    llm_config: { model: 'gpt-4', temperature: 0 },
    code_execution_config: { work_dir: 'out' },
    human_input_mode: 'NEVER'
  };

  it('falls back to the system message for the description', () => {
    const record = autogenAdapter.normalize(coder);
    expect(record.description).toBe('You write and run shell scripts.');
    expect(record.capabilities).toEqual(['code_execution:enabled', 'model:gpt-4']);
    expect(record.metadata).toEqual({
      systemMessage: 'You write and run shell scripts.',
      model: 'gpt-4',
      temperature: 0,
      codeExecution: true,
      humanInputMode: 'NEVER'
    });
    expect(record.trustScore).toBe(92);
  });

  it('keeps the input description over the system message', () => {
    expect(autogenAdapter.normalize({ ...coder, description: 'Writes scripts' }).description).toBe('Writes scripts');
  });

  it('tags human input unless it is disabled', () => {
    expect(autogenAdapter.normalize({ human_input_mode: 'ALWAYS' }).capabilities).toEqual(['human_input:enabled']);
  });
});

describe('n8n adapter', () => {
  it('summarizes agent and tool nodes of a workflow', () => {
    const record = n8nAdapter.normalize({
      workflow: {
        name: 'Support Flow',
        nodes: [
          {
            name: 'Agent',
            type: '@n8n/n8n-nodes-langchain.agent',
            parameters: { systemPrompt: 'Answer tickets', model: 'gpt-4o-mini', memory: { type: 'window' } }
          },
          { name: 'Lookup', type: 'n8n-nodes-base.httpRequest' },
          { name: 'Start', type: 'n8n-nodes-base.manualTrigger' }
        ],
        connections: { Start: {}, Agent: {} }
      }
    });
    expect(record.name).toBe('Support Flow');
    expect(record.description).toBe('n8n AI workflow automation');
    expect(record.capabilities).toEqual(['agent:Agent', 'memory:enabled', 'model:gpt-4o-mini', 'tool:Lookup']);
    expect(record.metadata).toEqual({
      systemPrompt: 'Answer tickets',
      model: 'gpt-4o-mini',
      memoryType: 'window',
      agentNodeCount: 1,
      toolNodeCount: 1,
      totalNodeCount: 3,
      connectionCount: 2
    });
    expect(record.trustScore).toBe(99);
  });
});

describe('babyagi adapter', () => {
  it('tags autonomy, task handling and vector memory', () => {
    const record = babyagiAdapter.normalize({
      objective: 'Grow the newsletter',
      tasks: [{ id: 1, name: 'Draft' }],
      vectorstore: 'chroma',
      task_creation_chain: {}
    });
    expect(record.description).toBe('BabyAGI pursuing: Grow the newsletter');
    expect(record.capabilities).toEqual([
      'autonomous:enabled',
      'memory:enabled',
      'task_creation:enabled',
      'task_prioritization:enabled',
      'tasks:1',
      'vectorstore:enabled'
    ]);
    expect(record.metadata.vectorstoreType).toBe('chroma');
    expect(record.metadata.taskStructure).toBe('complex');
    expect(record.trustScore).toBe(100);
  });
});

describe('bedrock agents adapter', () => {
  it('reads action groups, knowledge bases and guardrails', () => {
    const record = bedrockAgentsAdapter.normalize({
      agent_name: 'Claims Assistant',
      instruction: 'Handle insurance claims',
      foundation_model: 'anthropic.claude-v2',
      agent_resource_role_arn: 'arn:aws:iam::000000000000:role/test',
      action_groups: [
        { action_group_name: 'ClaimsApi', api_schema: {}, action_group_executor: { lambda: 'arn:aws:lambda:test' } }
      ],
      knowledge_bases: [{ knowledge_base_id: 'KB1', description: 'Policies' }],
      guardrails: { guardrail_id: 'g1', guardrail_version: '1' }
    });
    expect(record.name).toBe('Claims Assistant');
    expect(record.description).toBe('Handle insurance claims');
    expect(record.capabilities).toEqual([
      'action_group:ClaimsApi',
      'action_groups:enabled',
      'api_schema:defined',
      'guardrails:enabled',
      'iam:configured',
      'knowledge_base:KB1',
      'knowledge_bases:enabled',
      'lambda:enabled',
      'model:anthropic.claude-v2'
    ]);
    expect(record.metadata.knowledgeBaseDescriptions).toEqual({ KB1: 'Policies' });
    expect(record.metadata.guardrailId).toBe('g1');
    expect(record.trustScore).toBe(100);
  });
});

describe('semantic kernel adapter', () => {
  it('reads plugins, planner and memory', () => {
    const record = semanticKernelAdapter.normalize({
      name: 'Travel Kernel',
      plugins: [{ name: 'weather' }, 'calendar'],
      planner: { type: 'stepwise' },
      memory: true
    });
    expect(record.capabilities).toEqual([
      'memory:enabled',
      'planner:stepwise',
      'plugin:calendar',
      'plugin:weather',
      'plugins:2'
    ]);
    expect(record.metadata.pluginCount).toBe(2);
    expect(record.metadata.memoryType).toBe('semantic');
    expect(record.trustScore).toBe(100);
  });
});

describe('llamaindex agents adapter', () => {
  it('reads a microservice with an orchestrator', () => {
    const record = llamaindexAgentsAdapter.normalize({
      agent_service: { service_name: 'retriever', description: 'Retrieves documents', host: 'localhost', port: 8001 },
      orchestrator: { agents: [{ name: 'retriever' }, { name: 'writer' }, { name: 'critic' }] },
      message_queue: { type: 'simple' }
    });
    expect(record.description).toBe('Retrieves documents');
    expect(record.capabilities).toEqual([
      'agents:3',
      'message_queue:enabled',
      'microservice:enabled',
      'orchestrator:enabled'
    ]);
    expect(record.metadata.messageQueueType).toBe('simple');
    expect(record.metadata.agentCount).toBe(3);
  });
});

describe('llamastack adapter', () => {
  it('maps builtin tools to capabilities', () => {
    const record = llamastackAdapter.normalize({
      agent_config: { system_prompt: 'Plan meals', model: 'llama-3-70b' },
      tools: [{ type: 'code_interpreter' }, 'web_search'],
      safety: { shields: ['llama_guard'] }
    });
    expect(record.description).toBe('Plan meals');
    expect(record.capabilities).toEqual([
      'code_execution:enabled',
      'model:llama-3-70b',
      'safety:enabled',
      'shields:1',
      'tool:code_interpreter',
      'tool:web_search',
      'tools:2',
      'web_search:enabled'
    ]);
    expect(record.metadata.toolCount).toBe(2);
  });
});

describe('mistral agents adapter', () => {
  it('reads function calling, JSON mode and safe mode', () => {
    const record = mistralAgentsAdapter.normalize({
      model: 'mistral-large-latest',
      tools: [{ type: 'function', function: { name: 'get_weather' } }, { type: 'web_search' }],
      response_format: { type: 'json_object' },
      safe_mode: true,
      stream: true
    });
    expect(record.capabilities).toEqual([
      'function:get_weather',
      'function:web_search',
      'function_calling:enabled',
      'functions:2',
      'json_mode:enabled',
      'model:mistral-large-latest',
      'safe_mode:enabled',
      'streaming:enabled',
      'web_search:enabled'
    ]);
    expect(record.metadata.functionCount).toBe(2);
    expect(record.trustScore).toBe(100);
  });
});

describe('agentforce adapter', () => {
  it('unwraps a deployment result', () => {
    const record = agentforceAdapter.normalize({
      id: '0Ai000000000001',
      deployResult: { status: 'Succeeded' },
      agent: {
        name: 'Service Agent',
        description: 'Premium support agent',
        agent_type: 'External',
        agent_template_type: 'EinsteinServiceAgent',
        company_name: 'Acme',
        domain: 'Customer Service',
        sample_utterances: ['Where is my order?', 'Refund please'],
        variables: [{ name: 'customer_id', data_type: 'Text' }],
        system_messages: [{ message: 'Always comply with GDPR.', msg_type: 'system' }],
        topics: ['orders', 'refunds', 'complaints']
      }
    });
    expect(record.name).toBe('Service Agent');
    expect(record.description).toBe('Premium support agent');
    expect(record.owner).toBe('Acme');
    expect(record.capabilities).toEqual([
      'compliance:enabled',
      'domain:Customer Service',
      'instructions:enabled',
      'template:EinsteinServiceAgent',
      'topic:complaints',
      'topic:orders',
      'topic:refunds',
      'utterances:2',
      'variables:1'
    ]);
    expect(record.metadata.salesforceId).toBe('0Ai000000000001');
    expect(record.metadata.deploymentStatus).toBe('Succeeded');
    expect(record.trustScore).toBe(100);
  });

  it('keeps an explicit owner over the company name', () => {
    const record = agentforceAdapter.normalize({ agent_template_type: 'Custom', company_name: 'Acme', owner: 'Ops Team' });
    expect(record.owner).toBe('Ops Team');
  });
});

describe('google adk adapter', () => {
  it('records the session service for the base scorer', () => {
    const record = googleAdkAdapter.normalize({ model: 'gemini-2.0-flash', session_service: 'db' });
    expect(record.capabilities).toEqual(['model:gemini-2.0-flash', 'session:enabled']);
    expect(record.metadata).toEqual({ framework: 'google-adk', model: 'gemini-2.0-flash', sessionService: 'db' });
    expect(record.trustScore).toBe(89);
  });

  it('treats sub agents as orchestration', () => {
    const record = googleAdkAdapter.normalize({
      name: 'trip_planner',
      instruction: 'Plan trips',
      sub_agents: [{ name: 'flights' }, { name: 'hotels' }],
      agent_class: 'SequentialAgent'
    });
    expect(record.description).toBe('Plan trips');
    expect(record.capabilities).toEqual(['agents:2', 'orchestration:enabled', 'workflow:sequential']);
    expect(record.metadata.agentNames).toEqual(['flights', 'hotels']);
    expect(record.metadata.orchestrationCapable).toBe(true);
  });
});
