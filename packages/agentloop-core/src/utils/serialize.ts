import type { Handoff } from '../handoff';
import type { SerializedHandoff, SerializedTool } from '../model';
import type { Tool } from '../tool';

export function serializeTool<TContext>(tool: Tool<TContext>): SerializedTool {
  switch (tool.type) {
    case 'function':
      return {
        type: 'function',
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
        strict: tool.strict,
      };
    case 'action':
      return {
        type: 'action',
        callType: tool.callType,
        name: tool.name,
      };
    case 'protocol_server':
      return {
        type: 'protocol_server',
        serverLabel: tool.serverLabel,
        serverUrl: tool.serverUrl,
        allowedTools: tool.allowedTools,
        requireApproval: tool.requireApproval,
      };
    case 'hosted_tool':
      return {
        type: 'hosted_tool',
        name: tool.name,
        providerData: tool.providerData,
      };
  }
}

export function serializeHandoff<TContext>(
  h: Handoff<TContext>,
): SerializedHandoff {
  return {
    toolName: h.toolName,
    toolDescription: h.toolDescription,
    inputJsonSchema: h.inputJsonSchema,
    strictJsonSchema: h.strictJsonSchema,
  };
}
