import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Client, ClientOptions } from '@elastic/elasticsearch';
import { CAPTURES_INDEX_MAPPING, CAPTURES_INDEX_SETTINGS } from './captures.index';

@Injectable()
export class ElasticService implements OnModuleInit {
  private readonly logger = new Logger(ElasticService.name);
  private client: Client;
  private indexName: string;

  constructor(private readonly configService: ConfigService) {
    const node = this.configService.get<string>('elasticsearch.node') || 'http://localhost:9200';
    const username = this.configService.get<string>('elasticsearch.username') || 'elastic';
    const password = this.configService.get<string>('elasticsearch.password') || 'changeme';
    this.indexName = this.configService.get<string>('elasticsearch.index') || 'queue-captures';
    const requestTimeout = this.configService.get<number>('elasticsearch.requestTimeout', 30000);

    const clientOptions: ClientOptions = {
      node,
      auth: {
        username,
        password,
      },
      requestTimeout,
      maxRetries: 5,
    };

    this.client = new Client(clientOptions);
  }

  async onModuleInit() {
    await this.ensureIndexExists();
  }

  /**
   * Ensure the captures index exists, create it if it doesn't
   */
  private async ensureIndexExists() {
    try {
      const exists = await this.client.indices.exists({ index: this.indexName });

      if (!exists) {
        this.logger.log(`Creating Elasticsearch index: ${this.indexName}`);
        await this.client.indices.create({
          index: this.indexName,
          settings: CAPTURES_INDEX_SETTINGS,
          mappings: CAPTURES_INDEX_MAPPING,
        });
        this.logger.log(`Elasticsearch index '${this.indexName}' created successfully`);
      } else {
        this.logger.log(`Elasticsearch index '${this.indexName}' already exists`);
      }
    } catch (error) {
      this.logger.error(
        `Error ensuring index exists: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw error;
    }
  }

  /**
   * Check if Elasticsearch is connected
   */
  async checkConnection(): Promise<boolean> {
    try {
      return await this.client.ping();
    } catch (error) {
      this.logger.error(
        `Elasticsearch connection check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  getClient(): Client {
    return this.client;
  }

  getIndexName(): string {
    return this.indexName;
  }
}
