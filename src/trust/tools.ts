/**
 * Tool kinds the engine knows about.
 *
 * The set is closed: a new native tool is added here together with an
 * explicit decision about whether trust rules may auto-approve it. Anything
 * else the agent calls (MCP servers, extensions) is a custom tool and always
 * needs confirmation.
 */

export interface ToolKind {
  /** Human-readable label used in prompts and listings. */
  label: string;
  /** Only shell tools may be auto-approved through trust rules. */
  confirmableWithTrust: boolean;
}

export const NATIVE_TOOLS = {
  execute_bash: { label: "Run a shell command", confirmableWithTrust: true },
  execute_cmd: { label: "Run a Windows command", confirmableWithTrust: true },
  fs_read: { label: "Read a file", confirmableWithTrust: false },
  fs_write: { label: "Write a file", confirmableWithTrust: false },
  use_aws: { label: "Call a cloud API", confirmableWithTrust: false },
  report_issue: { label: "Open an issue report", confirmableWithTrust: false },
} as const satisfies Record<string, ToolKind>;

export type NativeToolName = keyof typeof NATIVE_TOOLS;

export type ToolId =
  | { kind: "native"; name: NativeToolName }
  | { kind: "custom"; name: string };

const CUSTOM_TOOL: ToolKind = {
  label: "Use an integration tool",
  confirmableWithTrust: false,
};

function isNativeToolName(name: string): name is NativeToolName {
  return Object.hasOwn(NATIVE_TOOLS, name);
}

export function nativeTool(name: NativeToolName): ToolId {
  return { kind: "native", name };
}

/** Map a tool name as it appears in a tool call or a config file to its id. */
export function parseToolId(name: string): ToolId {
  return isNativeToolName(name) ? { kind: "native", name } : { kind: "custom", name };
}

/** Key under which a tool's rules are persisted. */
export function toolIdKey(toolId: ToolId): string {
  return toolId.name;
}

export function toolKind(toolId: ToolId): ToolKind {
  return toolId.kind === "native" ? NATIVE_TOOLS[toolId.name] : CUSTOM_TOOL;
}

export function isConfirmableWithTrust(toolId: ToolId): boolean {
  return toolKind(toolId).confirmableWithTrust;
}

/** Native tools whose rules may be stored, in declaration order. */
export function trustableToolNames(): NativeToolName[] {
  return Object.keys(NATIVE_TOOLS)
    .filter(isNativeToolName)
    .filter((name) => NATIVE_TOOLS[name].confirmableWithTrust);
}
