import { TelegramClient } from 'telegram';
import { StringSession } from 'telegram/sessions';
import { UpstreamError } from '../../domain/errors';
import { ClientCredentials, ILogger, IRemoteClientFactory } from '../../domain/interfaces';
import { TelegramChunkClient } from './TelegramChunkClient';

export interface TelegramCredentials {
  apiId: number;
  apiHash: string;
}

/**
 * Connects bot or user sessions and wraps them as chunk clients
 */
export class TelegramClientFactory implements IRemoteClientFactory {
  constructor(
    private readonly app: TelegramCredentials,
    private readonly logger: ILogger
  ) { }

  async create(credentials: ClientCredentials): Promise<TelegramChunkClient> {
    const session = new StringSession(credentials.kind === 'user' ? credentials.session : '');
    const client = new TelegramClient(session, this.app.apiId, this.app.apiHash, {
      connectionRetries: 5
    });

    if (credentials.kind === 'bot') {
      await client.start({ botAuthToken: credentials.token });
      // The token's prefix is the bot id; the secret part stays out of ids and logs
      return new TelegramChunkClient(`bot:${credentials.token.split(':')[0]}`, client, this.logger);
    }

    await client.connect();
    if (!(await client.checkAuthorization())) {
      await client.disconnect();
      throw new UpstreamError(`Session of user ${credentials.userId} is not authorized`);
    }
    return new TelegramChunkClient(`user:${credentials.userId}`, client, this.logger);
  }
}
