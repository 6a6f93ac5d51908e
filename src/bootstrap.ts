// Ensure env is loaded before accessing process.env
import './config/env.config';

import { container, KEYS } from './container';
import { Env } from './config/env.config';

// External Clients
import { StatsProviderFactory } from './integrations/provider-factory';

// Services
import { StatsService } from './modules/stats/stats.service';
import { IdentityService } from './modules/players/identity.service';
import { TeamDirectory } from './modules/players/team-directory';
import { ReportAssembler } from './modules/reports/report-assembler.service';
import { ReportWriter } from './modules/reports/report-writer';
import { ReportConfig } from './modules/reports/report.model';

export interface BootstrapOverrides {
  /** Output directory from the command line, taking precedence over OUTPUT_DIR */
  outputDir?: string;
}

export function bootstrap(env: Env, overrides: BootstrapOverrides = {}): void {
  // Configuration
  container.register(KEYS.ENV, () => env);
  container.register(
    KEYS.REPORT_CONFIG,
    (): ReportConfig => ({
      outputDir: overrides.outputDir ?? env.OUTPUT_DIR,
      defaultSeasons: env.DEFAULT_SEASONS,
    })
  );

  // External Clients
  container.register(KEYS.STATS_PROVIDER, () =>
    StatsProviderFactory.createProvider(env.STATS_PROVIDER, {
      baseUrl: env.NFLVERSE_BASE_URL,
      timeoutMs: env.HTTP_TIMEOUT_MS,
    })
  );

  // Services
  container.register(KEYS.STATS_SERVICE, () => new StatsService(container.resolve(KEYS.STATS_PROVIDER)));
  container.register(KEYS.IDENTITY_SERVICE, () => new IdentityService(TeamDirectory.load()));
  container.register(
    KEYS.REPORT_ASSEMBLER,
    () => new ReportAssembler(container.resolve(KEYS.REPORT_CONFIG))
  );
  container.register(
    KEYS.REPORT_WRITER,
    () => new ReportWriter(container.resolve<ReportConfig>(KEYS.REPORT_CONFIG).outputDir)
  );
}
