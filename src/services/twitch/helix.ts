import type { TwitchTokenManager } from './TwitchTokenManager';

export const HELIX_URL = 'https://api.twitch.tv/helix';

export async function helixHeaders(tokens: TwitchTokenManager): Promise<Record<string, string>> {
  return {
    'Client-Id': tokens.clientId,
    Authorization: `Bearer ${await tokens.getAccessToken()}`,
    'Content-Type': 'application/json'
  };
}
