export {
	type AgentSession,
	type AgentSessionOptions,
	type AgentToolCall,
	createAgentSession,
	type Turn,
} from './agent-session.js';
