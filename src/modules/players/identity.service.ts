import {
  IdentityCandidate,
  MIN_SIMILARITY,
  resolveIdentity,
} from '../../domain/identity/name-matching';
import { DataTable, distinctValues } from '../../domain/table';
import { logger } from '../../config/logger.config';
import { NoMatchError } from '../../utils/exceptions';
import { TeamDirectory } from './team-directory';

export interface IdentityResolution {
  /** Canonical identities, one per matched query, without duplicates */
  matches: string[];
  /** Queries that matched nothing; they are logged and skipped */
  misses: NoMatchError[];
}

function stringValues(table: DataTable, column: string): string[] {
  return distinctValues(table, column).filter(
    (value): value is string => typeof value === 'string' && value.length > 0
  );
}

/**
 * Resolves free-text player and team queries against the identities present in
 * the loaded tables. Each query resolves to its best match on its own.
 */
export class IdentityService {
  constructor(
    private readonly teams: TeamDirectory,
    private readonly threshold: number = MIN_SIMILARITY
  ) {}

  /** Match queries against the distinct player display names */
  resolvePlayers(queries: readonly string[], players: DataTable): IdentityResolution {
    const candidates = stringValues(players, 'player_display_name').map(
      (name): IdentityCandidate => ({ canonical: name })
    );
    return this.resolveAll(queries, candidates, 'player');
  }

  /** Match queries against the team codes in the D/ST table, by code, name or alias */
  resolveTeams(queries: readonly string[], dst: DataTable): IdentityResolution {
    const candidates = stringValues(dst, 'team').map(
      (code): IdentityCandidate => ({ canonical: code, aliases: this.teams.aliasesFor(code) })
    );
    return this.resolveAll(queries, candidates, 'team');
  }

  private resolveAll(
    queries: readonly string[],
    candidates: readonly IdentityCandidate[],
    kind: 'player' | 'team'
  ): IdentityResolution {
    const matches: string[] = [];
    const misses: NoMatchError[] = [];

    for (const query of queries) {
      const [best] = resolveIdentity(query, candidates, this.threshold);
      if (!best) {
        const miss = new NoMatchError(query, kind);
        logger.warn(miss.message);
        misses.push(miss);
        continue;
      }
      logger.info(`Found ${kind}: ${best.canonical} (score ${best.score})`);
      if (!matches.includes(best.canonical)) {
        matches.push(best.canonical);
      }
    }

    return { matches, misses };
  }
}
