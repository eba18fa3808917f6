/**
 * Unit tests for the Telegram channel
 */

import { createTelegramChannel } from './telegram';
import type { FetchFn } from '../types';

function replyWith(body: string, status: number) {
  return vi.fn<FetchFn>(async () => new Response(body, { status: status }));
}

const CONFIG = { botToken: 'test-token', chatId: 'test-chat', timeoutMs: 1000 };

describe('createTelegramChannel', () => {
  it('should identify as the telegram channel', () => {
    expect(createTelegramChannel(CONFIG, replyWith('{}', 200)).channel).toBe('telegram');
  });

  it('should post chat_id and text to the sendMessage method', async () => {
    const fetchFn = replyWith('{"ok":true}', 200);

    await createTelegramChannel(CONFIG, fetchFn).sendMessage('hello');

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('https://api.telegram.org/bottest-token/sendMessage');
    expect(init?.body).toBe('{"chat_id":"test-chat","text":"hello"}');
  });

  it('should succeed when the API answers ok true', async () => {
    const channel = createTelegramChannel(CONFIG, replyWith('{"ok":true,"result":{}}', 200));

    expect(await channel.sendMessage('hello')).toBe(true);
  });

  it('should fail when the API answers ok false', async () => {
    const channel = createTelegramChannel(CONFIG, replyWith('{"ok":false}', 200));

    expect(await channel.sendMessage('hello')).toBe(false);
  });

  it('should fail on an HTTP error status', async () => {
    const body = '{"ok":false,"description":"Bad Request: chat not found"}';
    const channel = createTelegramChannel(CONFIG, replyWith(body, 400));

    expect(await channel.sendMessage('hello')).toBe(false);
  });

  it('should fail when the body is not JSON', async () => {
    const channel = createTelegramChannel(CONFIG, replyWith('<html></html>', 200));

    expect(await channel.sendMessage('hello')).toBe(false);
  });
});
