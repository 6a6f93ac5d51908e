import { IStatsProvider } from './shared/stats-provider.interface';
import { ProviderConfig, ProviderType } from './shared/stats-provider.types';
import { NflverseApiClient } from './nflverse/nflverse-api-client';
import { NflverseStatsProvider } from './nflverse/nflverse-stats-provider';
import { logger } from '../config/logger.config';
import { ValidationException } from '../utils/exceptions';

/**
 * Factory for creating stats provider instances
 *
 * This factory encapsulates provider creation logic and allows runtime
 * selection of stats providers based on configuration.
 */
export class StatsProviderFactory {
  /**
   * Create a stats provider based on type
   * @param providerType - Provider identifier
   * @param config - Connection settings for the provider
   * @returns Configured stats provider instance
   */
  static createProvider(providerType: ProviderType, config: ProviderConfig): IStatsProvider {
    logger.info(`Creating stats provider: ${providerType}`);

    switch (providerType) {
      case 'nflverse': {
        const client = new NflverseApiClient(config);
        return new NflverseStatsProvider(client);
      }

      default:
        throw new ValidationException(`Unknown stats provider: ${String(providerType)}`);
    }
  }
}
