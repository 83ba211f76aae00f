import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { DEFAULT_DEVICE_PROFILES, listAvailableProfiles } from './device-profiles.js';
import { errorMessage } from './errors.js';
import type { SessionManager } from './session-manager.js';

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export type ToolInputSchema = {
  type: 'object';
  properties?: Record<string, unknown>;
  required?: string[];
};

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
};

// Schema definitions
const ConnectSchema = z.object({
  host: z.string().min(1).describe("Device host name or IP address"),
  port: z.number().int().min(1).max(65535).describe("Telnet port"),
  timeout: z.number().int().positive().optional().describe("Connection timeout in milliseconds (default: 5000)"),
  profile: z.string().optional().describe("Device profile used for session setup (default: cisco_ios)"),
  debug: z.boolean().optional().describe("Include debug logs in response (default: false)")
});

const ExecuteSchema = z.object({
  sessionId: z.string().describe("Session ID"),
  command: z.string().describe("Command line to send to the device"),
  waitMs: z.number().int().positive().optional().describe("Maximum wait in milliseconds (default: 2000). Returns as soon as the device prompt reappears; ping, traceroute, copy, write, reload, debug and show tech wait at least 12000"),
  debug: z.boolean().optional().describe("Include debug logs in response (default: false)")
});

const ListSessionsSchema = z.object({
  debug: z.boolean().optional().describe("Include debug logs in response (default: false)")
});

const SessionIdSchema = z.object({
  sessionId: z.string().describe("Session ID")
});

const GetFullOutputSchema = z.object({
  sessionId: z.string().describe("Session ID"),
  offset: z.number().int().min(0).optional().describe("Starting position in characters (default: 0)"),
  limit: z.number().int().positive().optional().describe("Number of characters to retrieve (default: 40000)")
});

const ListProfilesSchema = z.object({});

function toInputSchema(schema: z.ZodTypeAny): ToolInputSchema {
  const jsonSchema = zodToJsonSchema(schema);
  return {
    type: 'object',
    properties: 'properties' in jsonSchema ? jsonSchema.properties : undefined,
    required: 'required' in jsonSchema ? jsonSchema.required : undefined,
  };
}

export const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: "telnet_connect",
    description: "Open a Telnet session to a network device. The session is woken, taken out of configuration mode and has paging disabled before it is returned. deviceMode shows the prompt: 'SW1>' user mode (run 'enable'), 'SW1#' privileged mode, 'SW1(config)#' global configuration, 'SW1(config-if)#' interface configuration.",
    inputSchema: toInputSchema(ConnectSchema)
  },
  {
    name: "telnet_execute",
    description: "Run a command in a Telnet session and return its output together with the device mode shown by the final prompt. Output longer than 50KB is truncated; use telnet_get_full_output for the rest.",
    inputSchema: toInputSchema(ExecuteSchema)
  },
  {
    name: "telnet_list_sessions",
    description: "List all open Telnet sessions",
    inputSchema: toInputSchema(ListSessionsSchema)
  },
  {
    name: "telnet_disconnect",
    description: "Close a Telnet session",
    inputSchema: toInputSchema(SessionIdSchema)
  },
  {
    name: "telnet_get_full_output",
    description: "Get the last command's complete output for a session in chunks. Use offset and limit to page through large outputs.",
    inputSchema: toInputSchema(GetFullOutputSchema)
  },
  {
    name: "telnet_list_profiles",
    description: "List the device profiles available for telnet_connect",
    inputSchema: toInputSchema(ListProfilesSchema)
  },
];

function jsonResponse(body: Record<string, unknown>, isError = false): ToolResponse {
  const response: ToolResponse = {
    content: [
      {
        type: "text",
        text: JSON.stringify(body, null, 2)
      }
    ]
  };
  if (isError) {
    response.isError = true;
  }
  return response;
}

export async function handleToolCall(sessionManager: SessionManager, name: string, args: unknown): Promise<ToolResponse> {
  let attemptedSessionId: string | undefined;

  try {
    switch (name) {
      case "telnet_connect": {
        const { host, port, timeout = 5000, profile, debug } = ConnectSchema.parse(args);

        const result = await sessionManager.connect(host, port, timeout, profile);
        attemptedSessionId = result.sessionId;

        const response: Record<string, unknown> = {
          success: true,
          sessionId: result.sessionId,
          deviceMode: result.deviceMode,
          profile: sessionManager.getSession(result.sessionId).profile.name,
          message: `Connected to ${host}:${port}`
        };
        if (debug) {
          response.debugLogs = sessionManager.getDebugLogs(result.sessionId);
        }
        return jsonResponse(response);
      }

      case "telnet_execute": {
        const { sessionId, command, waitMs = 2000, debug } = ExecuteSchema.parse(args);
        attemptedSessionId = sessionId;

        const result = await sessionManager.execute(sessionId, command, waitMs);
        const { text, truncated } = sessionManager.truncateForMCPResponse(result.output);

        const response: Record<string, unknown> = {
          success: true,
          output: text,
          deviceMode: result.deviceMode,
          executionTime: result.executionTime,
          truncated
        };
        if (debug) {
          response.debugLogs = sessionManager.getDebugLogs(sessionId);
        }
        return jsonResponse(response);
      }

      case "telnet_list_sessions": {
        const { debug } = ListSessionsSchema.parse(args ?? {});

        const response: Record<string, unknown> = {
          success: true,
          sessions: sessionManager.listSessions()
        };
        // Only include debug logs if explicitly requested
        if (debug) {
          response.debugLogs = sessionManager.getDebugLogs();
        }
        return jsonResponse(response);
      }

      case "telnet_disconnect": {
        const { sessionId } = SessionIdSchema.parse(args);
        attemptedSessionId = sessionId;

        sessionManager.disconnect(sessionId);
        return jsonResponse({
          success: true,
          message: `Session ${sessionId} disconnected`
        });
      }

      case "telnet_get_full_output": {
        const { sessionId, offset = 0, limit = 40000 } = GetFullOutputSchema.parse(args);
        attemptedSessionId = sessionId;

        const chunk = sessionManager.getFullOutput(sessionId, offset, limit);
        return jsonResponse({ success: true, ...chunk });
      }

      case "telnet_list_profiles": {
        ListProfilesSchema.parse(args ?? {});
        return jsonResponse({
          success: true,
          profiles: listAvailableProfiles().map(profileName => DEFAULT_DEVICE_PROFILES[profileName])
        });
      }

      default:
        return {
          content: [
            {
              type: "text",
              text: `Unknown tool: ${name}`
            }
          ],
          isError: true
        };
    }
  } catch (error) {
    return jsonResponse({
      success: false,
      error: errorMessage(error),
      debugLogs: attemptedSessionId
        ? sessionManager.getDebugLogs(attemptedSessionId)
        : sessionManager.getDebugLogs()
    }, true);
  }
}
