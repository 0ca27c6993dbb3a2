import axios, { AxiosError, AxiosResponse } from 'axios';
import { describe, expect, it } from 'vitest';
import { TwitchChatService } from '../src/services/twitch/TwitchChatService';
import { TwitchRedemptionSource } from '../src/services/twitch/TwitchRedemptionSource';
import { TwitchTokenManager } from '../src/services/twitch/TwitchTokenManager';
import { ExternalServiceError } from '../src/utils/errors';
import { silentLogger } from './helpers/fakes';

interface RecordedRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
  data: unknown;
  authorization: string;
}

interface Reply {
  status: number;
  data: unknown;
}

/** axios instance answered in process; statuses >= 400 reject like the http adapter */
function fakeHttp(route: (request: RecordedRequest) => Reply) {
  const requests: RecordedRequest[] = [];
  const http = axios.create({
    adapter: async config => {
      const request: RecordedRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        params: config.params ?? {},
        data: config.data,
        authorization: String(config.headers.Authorization ?? '')
      };
      requests.push(request);
      const reply = route(request);
      const response: AxiosResponse = { data: reply.data, status: reply.status, statusText: '', headers: {}, config };
      if (reply.status >= 400) {
        throw new AxiosError(`Request failed with status code ${reply.status}`, AxiosError.ERR_BAD_REQUEST, config, null, response);
      }
      return response;
    }
  });
  return { http, requests };
}

const credentials = {
  label: 'streamer',
  clientId: 'test-client',
  clientSecret: 'test-secret',
  refreshToken: 'test-refresh'
};

function tokenReply(accessToken: string, refreshToken?: string): Reply {
  return { status: 200, data: { access_token: accessToken, refresh_token: refreshToken, expires_in: 3600 } };
}

describe('TwitchTokenManager', () => {
  it('refreshes once for concurrent callers and rotates the refresh token', async () => {
    let issued = 0;
    const { http, requests } = fakeHttp(() => {
      issued++;
      return tokenReply(`access-${issued}`, `refresh-${issued}`);
    });
    let clock = 1_000_000;
    const tokens = new TwitchTokenManager(credentials, http, silentLogger, () => clock);

    const [first, second] = await Promise.all([tokens.getAccessToken(), tokens.getAccessToken()]);
    expect([first, second]).toEqual(['access-1', 'access-1']);
    expect(requests).toHaveLength(1);
    expect(requests[0].data).toBe(
      'grant_type=refresh_token&refresh_token=test-refresh&client_id=test-client&client_secret=test-secret'
    );

    clock += 3_600_000 - 60_000 - 1;
    expect(await tokens.getAccessToken()).toBe('access-1');

    clock += 1;
    expect(await tokens.getAccessToken()).toBe('access-2');
    expect(requests[1].data).toContain('refresh_token=refresh-1&');
  });

  it('trusts a configured access token until it is invalidated', async () => {
    const { http, requests } = fakeHttp(() => tokenReply('renewed'));
    const tokens = new TwitchTokenManager({ ...credentials, accessToken: 'configured' }, http, silentLogger);

    expect(await tokens.getAccessToken()).toBe('configured');
    expect(requests).toHaveLength(0);

    tokens.invalidate();
    expect(await tokens.getAccessToken()).toBe('renewed');
    expect(requests[0].data).toContain('refresh_token=test-refresh&');
  });

  it('wraps a rejected refresh', async () => {
    const { http } = fakeHttp(() => ({ status: 400, data: { message: 'Invalid refresh token' } }));
    const tokens = new TwitchTokenManager(credentials, http, silentLogger);

    await expect(tokens.getAccessToken()).rejects.toMatchObject({ service: 'Twitch OAuth', status: 400 });
  });
});

describe('TwitchRedemptionSource', () => {
  function tokens(): TwitchTokenManager {
    return new TwitchTokenManager({ ...credentials, accessToken: 'user-token' }, fakeHttp(() => tokenReply('x')).http, silentLogger);
  }

  it('maps unfulfilled redemptions of every configured reward', async () => {
    const { http, requests } = fakeHttp(request => {
      if (request.params.reward_id === 'reward-a') {
        return { status: 200, data: { data: [{ id: 'r1', user_name: 'alice', user_input: 'Celeste' }] } };
      }
      return { status: 200, data: { data: [{ id: 'r2', user_name: 'bob' }] } };
    });
    const source = new TwitchRedemptionSource({
      broadcasterId: 'b-1',
      rewards: { ordinary: 'reward-a', premium: 'reward-c' },
      tokens: tokens(),
      http,
      logger: silentLogger
    });

    expect(await source.fetchUnfulfilled()).toEqual([
      { eventId: 'r1', actor: 'alice', rawText: 'Celeste', kind: 'ordinary', sourceRef: { rewardId: 'reward-a', redemptionId: 'r1' } },
      { eventId: 'r2', actor: 'bob', rawText: '', kind: 'premium', sourceRef: { rewardId: 'reward-c', redemptionId: 'r2' } }
    ]);
    expect(requests.find(request => request.params.reward_id === 'reward-a')).toMatchObject({
      method: 'GET',
      url: 'https://api.twitch.tv/helix/channel_points/custom_rewards/redemptions',
      params: { broadcaster_id: 'b-1', reward_id: 'reward-a', status: 'UNFULFILLED', first: 20 },
      authorization: 'Bearer user-token'
    });
  });

  it('stops polling a reward the app may not manage', async () => {
    const { http, requests } = fakeHttp(request =>
      request.params.reward_id === 'reward-a'
        ? { status: 403, data: { message: 'Forbidden' } }
        : { status: 200, data: { data: [] } }
    );
    const source = new TwitchRedemptionSource({
      broadcasterId: 'b-1',
      rewards: { ordinary: 'reward-a', elevated: 'reward-b' },
      tokens: tokens(),
      http,
      logger: silentLogger
    });

    await source.fetchUnfulfilled();
    await source.fetchUnfulfilled();

    expect(requests.map(request => String(request.params.reward_id)).sort()).toEqual(['reward-a', 'reward-b', 'reward-b']);
  });

  it('fails only when every reward request fails', async () => {
    const { http } = fakeHttp(() => ({ status: 503, data: { message: 'Unavailable' } }));
    const source = new TwitchRedemptionSource({
      broadcasterId: 'b-1',
      rewards: { ordinary: 'reward-a', elevated: 'reward-b' },
      tokens: tokens(),
      http,
      logger: silentLogger
    });

    await expect(source.fetchUnfulfilled()).rejects.toBeInstanceOf(ExternalServiceError);
  });

  it('treats an already fulfilled redemption as done', async () => {
    const { http, requests } = fakeHttp(() => ({
      status: 400,
      data: { error: 'Bad Request', status: 400, message: 'The redemption is already FULFILLED or CANCELED' }
    }));
    const source = new TwitchRedemptionSource({ broadcasterId: 'b-1', rewards: {}, tokens: tokens(), http, logger: silentLogger });

    await expect(source.markFulfilled({ rewardId: 'reward-a', redemptionId: 'r1' })).resolves.toBe(true);
    expect(requests[0]).toMatchObject({
      method: 'PATCH',
      params: { broadcaster_id: 'b-1', reward_id: 'reward-a', id: 'r1' },
      data: '{"status":"FULFILLED"}'
    });
  });

  it('propagates other fulfilment errors', async () => {
    const { http } = fakeHttp(() => ({ status: 404, data: { message: 'Not Found' } }));
    const source = new TwitchRedemptionSource({ broadcasterId: 'b-1', rewards: {}, tokens: tokens(), http, logger: silentLogger });

    await expect(source.markFulfilled({ rewardId: 'reward-a', redemptionId: 'r1' })).rejects.toMatchObject({
      service: 'Twitch Helix',
      status: 404
    });
  });
});

describe('TwitchChatService', () => {
  it('sends as the bot and truncates long messages', async () => {
    const { http, requests } = fakeHttp(() => ({ status: 200, data: { data: [{ is_sent: true }] } }));
    const tokens = new TwitchTokenManager({ ...credentials, accessToken: 'bot-token' }, http, silentLogger);
    const chat = new TwitchChatService('b-1', 'bot-9', tokens, http, silentLogger);

    await chat.postMessage('x'.repeat(600));

    expect(requests[0].url).toBe('https://api.twitch.tv/helix/chat/messages');
    expect(requests[0].authorization).toBe('Bearer bot-token');
    expect(requests[0].data).toBe(JSON.stringify({ broadcaster_id: 'b-1', sender_id: 'bot-9', message: 'x'.repeat(500) }));
  });

  it('drops the token after a 401 so the next message refreshes it', async () => {
    let rejectChat = true;
    const { http, requests } = fakeHttp(request => {
      if (request.url.includes('oauth2')) {
        return tokenReply('bot-token-2');
      }
      if (rejectChat) {
        rejectChat = false;
        return { status: 401, data: { message: 'Invalid OAuth token' } };
      }
      return { status: 200, data: { data: [] } };
    });
    const tokens = new TwitchTokenManager({ ...credentials, accessToken: 'bot-token' }, http, silentLogger);
    const chat = new TwitchChatService('b-1', 'bot-9', tokens, http, silentLogger);

    await expect(chat.postMessage('hi')).rejects.toBeInstanceOf(ExternalServiceError);
    await chat.postMessage('hi again');

    expect(requests.map(request => request.authorization)).toEqual(['Bearer bot-token', '', 'Bearer bot-token-2']);
  });
});
