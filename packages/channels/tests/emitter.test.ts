import { describe, it, expect } from 'vitest';
import { ChannelEmitter, channelContext } from '../src/emitter.ts';
import { MessageBus } from '../src/bus.ts';
import { ChannelManager } from '../src/channel-manager.ts';
import { BaseChannel } from '../src/base-channel.ts';
import type { ChannelMessage, ChannelReply } from '../src/messages.ts';

class TypingChannel extends BaseChannel {
  readonly name = 'chat';
  typing: string[] = [];
  async start(): Promise<void> {}
  async stop(): Promise<void> {}
  async send(_reply: ChannelReply): Promise<void> {}
  override async sendTyping(chatId: string): Promise<void> {
    this.typing.push(chatId);
  }
}

const inbound: ChannelMessage = {
  channel: 'chat',
  senderId: '42|alice',
  chatId: '1001',
  content: 'hi',
  timestamp: new Date(),
  metadata: { messageId: 77 },
};

describe('channelContext', () => {
  it('should carry routing fields and stringify the message id', () => {
    expect(channelContext(inbound)).toEqual({
      channel: 'chat',
      chatId: '1001',
      senderId: '42|alice',
      messageId: '77',
    });
  });

  it('should omit the message id when the channel has none', () => {
    expect(channelContext({ ...inbound, metadata: {} })).toEqual({
      channel: 'chat',
      chatId: '1001',
      senderId: '42|alice',
    });
  });
});

describe('ChannelEmitter', () => {
  it('should publish responses on the outbound queue', async () => {
    const bus = new MessageBus();
    const emitter = new ChannelEmitter(bus, new ChannelManager(bus));

    await emitter.send(channelContext(inbound), { type: 'text', text: 'hello' });

    expect(await bus.consumeOutbound()).toEqual({
      channel: 'chat',
      chatId: '1001',
      response: { type: 'text', text: 'hello' },
      replyTo: '77',
      metadata: {},
    });
  });

  it('should send typing through the channel manager', async () => {
    const bus = new MessageBus();
    const manager = new ChannelManager(bus);
    const channel = new TypingChannel({ enabled: true }, bus);
    manager.register(channel);

    await new ChannelEmitter(bus, manager).sendTyping(channelContext(inbound));
    expect(channel.typing).toEqual(['1001']);
  });
});
