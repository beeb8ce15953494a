import type { Server } from 'node:http';
import express, { type Express } from 'express';
import {
  CompletionClient,
  Dispatcher,
  EventBus,
  LogBuffer,
  PatternMatcher,
  PROCESSING_ERROR_REPLY,
  VERSION,
  createDefaultCommands,
  createDefaultRoutes,
  createModelProvider,
  textResponse,
} from '@parley/core';
import {
  createRestRouter,
  MessageBus,
  ChannelManager,
  ChannelEmitter,
  CLIChannel,
  TelegramChannel,
  channelContext,
  type ChannelContext,
  type ChannelMessage,
  type MessageHandler,
} from '@parley/channels';
import type { CompletionSettings, ServerConfig } from './types.ts';

export interface ParleyServer {
  app: Express;
  dispatcher: Dispatcher<ChannelContext>;
  eventBus: EventBus;
  logs: LogBuffer;
  bus: MessageBus;
  channelManager: ChannelManager;
  /** Answer one message inline, without any channel. */
  handler: MessageHandler;
  /** Listen for HTTP and start the enabled channels. */
  start: (port?: number) => Promise<void>;
  /** Start the enabled channels only. */
  startChannels: () => Promise<void>;
  stop: () => Promise<void>;
}

export function createServer(config: ServerConfig): ParleyServer {
  const name = config.name ?? 'Parley';
  const version = config.version ?? VERSION;
  const port = config.port ?? 4000;
  const host = config.host ?? 'localhost';
  const modelLabel = config.modelLabel ?? (typeof config.model === 'string' ? config.model : config.model.modelId);

  const eventBus = new EventBus();
  const logs = LogBuffer.attach(eventBus);
  eventBus.on('completion-error', (d) => {
    console.warn(`[${name}] Completion failed (${d.kind}): ${d.detail}`);
  });
  eventBus.on('handler-error', (d) => {
    console.error(`[${name}] ${d.route} handler "${d.name}" failed: ${d.message}`);
  });
  eventBus.on('typing-failed', (d) => {
    console.warn(`[${name}] Typing indicator failed: ${d.message}`);
  });

  const settings: CompletionSettings = config.completion ?? {};
  const { timeoutMs, ...modelOptions } = settings;
  const provider = config.completionProvider ?? createModelProvider(config.model, modelOptions);
  const completion = new CompletionClient(provider, { timeoutMs });

  const bus = new MessageBus();
  const channelManager = new ChannelManager(bus);

  const dispatcher = new Dispatcher<ChannelContext>({
    patterns: new PatternMatcher(createDefaultRoutes<ChannelContext>({ linkPreview: config.linkPreview })),
    commands: createDefaultCommands<ChannelContext>({ name, version, model: modelLabel }),
    completion,
    emitter: new ChannelEmitter(bus, channelManager),
    eventBus,
  });

  // Aborted on stop(); abandons every in-flight completion.
  const lifecycle = new AbortController();

  const handler: MessageHandler = {
    handle: async (msg, signal) => {
      const { route, response } = await dispatcher.resolve(
        {
          text: msg.text,
          context: { channel: msg.channelId, chatId: msg.conversationId, senderId: msg.userId },
        },
        { signal: signal ? AbortSignal.any([signal, lifecycle.signal]) : lifecycle.signal },
      );
      return { route, response };
    },
  };

  // Express app
  const app = express();

  // Health endpoint
  const startTime = Date.now();
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      name,
      version,
      model: modelLabel,
      uptime: Math.floor((Date.now() - startTime) / 1000),
    });
  });

  app.use('/api', createRestRouter({
    handler,
    adminApiKey: config.adminApiKey,
    getRecentLogs: (count, filter) => (filter ? logs.filter(filter).slice(-count) : logs.tail(count)),
  }));

  if (config.channels?.cli?.enabled) {
    channelManager.register(new CLIChannel(config.channels.cli, bus));
  }
  if (config.channels?.telegram?.enabled) {
    channelManager.register(new TelegramChannel(config.channels.telegram, bus));
  }

  const handleInbound = async (msg: ChannelMessage): Promise<void> => {
    try {
      await dispatcher.dispatch({ text: msg.content, context: channelContext(msg) }, { signal: lifecycle.signal });
    } catch (err) {
      if (lifecycle.signal.aborted) return;
      console.error(`[${name}] Channel message error:`, err);
      bus.publishOutbound({
        channel: msg.channel,
        chatId: msg.chatId,
        response: textResponse(PROCESSING_ERROR_REPLY),
        metadata: {},
      });
    }
  };

  // Inbound consumer loop: bus → dispatcher → bus.outbound. Each message is
  // handled on its own so a slow completion never holds up the next one.
  const consumeInbound = async (signal: AbortSignal): Promise<void> => {
    while (!signal.aborted) {
      let msg: ChannelMessage;
      try {
        msg = await bus.consumeInbound(signal);
      } catch (err) {
        if (signal.aborted) return;
        throw err;
      }
      handleInbound(msg).catch((err) => {
        console.error(`[${name}] Unhandled dispatch failure:`, err);
      });
    }
  };

  let httpServer: Server | null = null;
  let consuming = false;

  const startChannels = async (): Promise<void> => {
    if (!consuming) {
      consuming = true;
      consumeInbound(lifecycle.signal).catch((err) => {
        console.error(`[${name}] Inbound loop stopped:`, err);
      });
    }
    await channelManager.startAll();
    const names = Object.keys(channelManager.getStatus());
    if (names.length > 0) {
      console.log(`[${name}] Channels started:`, names.join(', '));
    }
  };

  return {
    app,
    dispatcher,
    eventBus,
    logs,
    bus,
    channelManager,
    handler,
    startChannels,
    start: async (overridePort?: number) => {
      const p = overridePort ?? port;
      httpServer = await new Promise<Server>((resolve, reject) => {
        const server = app.listen(p, host, () => {
          console.log(`[${name}] Server started on http://${host}:${p}`);
          console.log(`[${name}] REST API: http://${host}:${p}/api/chat`);
          console.log(`[${name}] Health: http://${host}:${p}/health`);
          resolve(server);
        });
        server.on('error', reject);
      });
      await startChannels();
    },
    stop: async () => {
      lifecycle.abort();
      await channelManager.stopAll();
      const server = httpServer;
      httpServer = null;
      if (server) {
        await new Promise<void>((resolve, reject) => {
          server.close((err) => (err ? reject(err) : resolve()));
        });
      }
    },
  };
}
