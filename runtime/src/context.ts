/**
 * Runtime Context
 *
 * Builds every long-lived service once and hands them around explicitly.
 * Tests build their own pieces; the entry point builds one of these.
 */

import { HostBridge, QueueTransport } from "./bridge/index.js";
import { SandboxExecutor } from "./sandbox/index.js";
import { ToolDispatcher } from "./tools/index.js";
import { ConversationSession } from "./session/index.js";
import { AnthropicClient, ResilientModelClient } from "./llm/index.js";
import { Conductor } from "./conductor/index.js";
import { CredentialStore } from "./credentials.js";
import { RpcHandler } from "./rpc/index.js";
import { HostLinkServer } from "./ws/index.js";
import { selfImprove } from "./improve/index.js";
import { getRuntimeLogger } from "./logging.js";
import type { RuntimeConfig } from "./config.js";

export interface RuntimeContext {
  config: RuntimeConfig;
  credentials: CredentialStore;
  session: ConversationSession;
  transport: QueueTransport;
  bridge: HostBridge;
  sandbox: SandboxExecutor;
  dispatcher: ToolDispatcher;
  conductor: Conductor;
  rpc: RpcHandler;
  server: HostLinkServer;
}

export function createRuntimeContext(config: RuntimeConfig): RuntimeContext {
  const credentials = new CredentialStore({ apiKey: config.apiKey });
  const session = new ConversationSession();
  const transport = new QueueTransport();
  const bridge = new HostBridge(transport);
  const sandbox = new SandboxExecutor();
  const dispatcher = new ToolDispatcher({ bridge, sandbox });

  const createRawClient = (apiKey: string) => new AnthropicClient({ apiKey, baseUrl: config.apiBaseUrl });

  const conductor = new Conductor({
    createClient: apiKey => new ResilientModelClient(createRawClient(apiKey), { retryCount: config.retryCount }),
    tools: dispatcher,
    reporter: bridge,
    session,
    config,
    credentials: () => credentials.get(),
  });

  const rpc = new RpcHandler({
    runTurn: request => conductor.runTurn(request),
    selfImprove: request => selfImprove(request, {
      createClient: createRawClient,
      reporter: bridge,
      model: config.models.advanced,
      toolNames: () => dispatcher.toolNames(),
    }),
    session,
    credentials,
    recentLogs: count => getRuntimeLogger().getRecentLogs(count),
  });

  const server = new HostLinkServer(transport, rpc, { host: config.wsHost, port: config.wsPort });

  return { config, credentials, session, transport, bridge, sandbox, dispatcher, conductor, rpc, server };
}
