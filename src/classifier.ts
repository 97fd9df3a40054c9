import { ExceptionNotInGroupError, UnknownLintInGroupError } from "./errors";
import {
  allowLists,
  ENABLED_GROUPS,
  EXHAUSTIVE_DEFAULT_LEVEL,
  EXHAUSTIVE_GROUP,
  GROUP_PRIORITY,
  RESTRICTION_EXCEPTIONS
} from "./policy";
import {
  CatalogEntry,
  Config,
  Exceptions,
  ExhaustiveGroup,
  LintGroup,
  LintId,
  LintLevel,
  Profile,
  Setting
} from "./types";

function singleSetting(lint: LintId, level: LintLevel): Setting {
  return {
    kind: "single",
    lint,
    priority: { kind: "unspecified" },
    level
  };
}

function groupSetting(group: LintGroup, level: LintLevel): Setting {
  return {
    kind: "group",
    group,
    priority: { kind: "explicit", value: GROUP_PRIORITY },
    level
  };
}

/**
 * Allows each listed lint, in list order. Every id must exist in the catalog
 * under `group`; the first one that does not is thrown.
 */
export function allowLints(catalog: CatalogEntry[], group: LintGroup, lints: LintId[]): Setting[] {
  return lints.map((lint) => {
    const found = catalog.some((entry) => entry.id === lint && entry.group === group);
    if (!found) {
      throw new UnknownLintInGroupError(lint, group);
    }
    return singleSetting(lint, "allow");
  });
}

/**
 * Partitions every catalog lint of `group` into exceptions (at
 * `exceptions.level`) and defaults (at `defaultLevel`). Both halves keep
 * catalog order, and every exception id must belong to the group.
 */
export function splitGroupExhaustive(
  catalog: CatalogEntry[],
  group: LintGroup,
  defaultLevel: LintLevel,
  exceptions: Exceptions
): ExhaustiveGroup {
  const members = catalog.filter((entry) => entry.group === group).map((entry) => entry.id);
  const memberSet = new Set(members);

  const missing = exceptions.lints.find((lint) => !memberSet.has(lint));
  if (missing !== undefined) {
    throw new ExceptionNotInGroupError(missing, group);
  }

  const exceptionSet = new Set(exceptions.lints);
  return members.reduce<ExhaustiveGroup>(
    (acc, lint) => {
      if (exceptionSet.has(lint)) {
        acc.exceptions.push(singleSetting(lint, exceptions.level));
      } else {
        acc.defaults.push(singleSetting(lint, defaultLevel));
      }
      return acc;
    },
    { defaults: [], exceptions: [] }
  );
}

/**
 * Builds the full lint table for `profile`. Throws `ExceptionNotInGroupError`
 * or `UnknownLintInGroupError` when the catalog no longer matches the policy.
 */
export function buildConfig(catalog: CatalogEntry[], profile: Profile): Config {
  const restrictions = splitGroupExhaustive(
    catalog,
    EXHAUSTIVE_GROUP,
    EXHAUSTIVE_DEFAULT_LEVEL,
    RESTRICTION_EXCEPTIONS
  );

  return [
    {
      comment: "enabled groups",
      settings: ENABLED_GROUPS.map(({ group, level }) => groupSetting(group, level))
    },
    ...allowLists(profile).map(({ group, comment, lints }) => ({
      comment,
      settings: allowLints(catalog, group, lints)
    })),
    {
      comment: "selected restrictions",
      settings: restrictions.exceptions
    },
    {
      comment: "restrictions explicit allows",
      settings: restrictions.defaults
    }
  ];
}
