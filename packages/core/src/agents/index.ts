// packages/core/src/agents -- Role agents, invocation and output parsing

export { AgentInvoker } from './invoker.js';
export type { AgentInvokerOptions, InvokeOptions } from './invoker.js';
export { renderPrompt } from './prompts.js';
export type { RenderedPrompt } from './prompts.js';
export { parseDocuments, extractJson, normalizeDocumentPath } from './documents.js';
export type { AgentDocument } from './documents.js';
export { validateManifest, withImplicitRoot, isSafeComponentId, ROOT_COMPONENT_ID } from './manifest.js';
export { ArchitectureAgent } from './architecture-agent.js';
export type { ArchitectureProposal } from './architecture-agent.js';
export { ComponentAgent } from './component-agent.js';
export type { ComponentAttempt, ComponentContext } from './component-agent.js';
export { ValidationAgent, checkCompleteness, creditFixes, meanConfidence } from './validation-agent.js';
export type { ValidationAgentOptions, ValidationContext } from './validation-agent.js';
