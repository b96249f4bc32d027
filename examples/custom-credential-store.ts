/**
 * Example of a credential store backed by your own user service
 */
import { Logger, Module } from '@nestjs/common';
import { ICredentialStore, KeyAdmissionModule } from '../src';
import { GreetingController } from './greeting.controller';

interface ApiClient {
  apiKey: string;
  revoked: boolean;
}

/**
 * Stand-in for whatever owns your API clients (a database repository, an auth service)
 */
export class ApiClientRepository {
  private readonly clients: ApiClient[] = [
    { apiKey: 'demo-key-1', revoked: false },
    { apiKey: 'demo-key-2', revoked: true },
  ];

  async findByKey(apiKey: string): Promise<ApiClient | undefined> {
    return this.clients.find((client) => client.apiKey === apiKey);
  }
}

export class RepositoryCredentialStore implements ICredentialStore {
  private readonly logger = new Logger(RepositoryCredentialStore.name);

  constructor(private readonly repository: ApiClientRepository) {}

  async initialize(): Promise<void> {
    this.logger.log('Using ApiClientRepository for API key lookups');
  }

  async isValid(key: string): Promise<boolean> {
    const client = await this.repository.findByKey(key);
    return client !== undefined && !client.revoked;
  }
}

@Module({
  imports: [
    KeyAdmissionModule.forRoot({
      capacity: 5,
      windowSeconds: 60,
      credentialStore: 'custom',
      customCredentialStoreInstance: new RepositoryCredentialStore(
        new ApiClientRepository(),
      ),
    }),
  ],
  controllers: [GreetingController],
})
export class CustomCredentialsAppModule {}
