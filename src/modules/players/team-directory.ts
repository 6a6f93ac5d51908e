import teamsData from '../../data/nfl-teams.json';
import { ValidationException } from '../../utils/exceptions';
import { TeamEntry, teamDirectorySchema } from './players.schemas';

/**
 * Team codes with their full names and common aliases.
 */
export class TeamDirectory {
  private readonly byCode: Map<string, TeamEntry>;

  constructor(entries: readonly TeamEntry[]) {
    this.byCode = new Map(entries.map((entry) => [entry.code, entry]));
  }

  /**
   * Validate raw directory data
   * @throws ValidationException listing the first schema issue
   */
  static fromData(data: unknown): TeamDirectory {
    const parsed = teamDirectorySchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationException(
        `Invalid team directory at ${issue.path.join('.') || '(root)'}: ${issue.message}`
      );
    }
    return new TeamDirectory(parsed.data);
  }

  /** Directory shipped with the project */
  static load(): TeamDirectory {
    return TeamDirectory.fromData(teamsData);
  }

  get size(): number {
    return this.byCode.size;
  }

  get(code: string): TeamEntry | undefined {
    return this.byCode.get(code.toUpperCase());
  }

  /** Full name and aliases for a code; empty for codes not in the directory */
  aliasesFor(code: string): string[] {
    const entry = this.get(code);
    return entry ? [entry.name, ...entry.aliases] : [];
  }
}
