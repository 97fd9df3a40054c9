import restrictionExceptions from "./restriction-exceptions.json";
import { Exceptions, LintGroup, LintId, LintLevel, Profile } from "./types";

export interface EnabledGroup {
  group: LintGroup;
  level: LintLevel;
}

export interface AllowList {
  group: LintGroup;
  comment: string;
  lints: LintId[];
}

// Applied before any single-lint setting.
export const GROUP_PRIORITY = -1;

export const ENABLED_GROUPS: readonly EnabledGroup[] = [
  { group: "correctness", level: "deny" },
  { group: "suspicious", level: "warn" },
  { group: "style", level: "warn" },
  { group: "complexity", level: "warn" },
  { group: "perf", level: "warn" },
  { group: "cargo", level: "warn" },
  { group: "pedantic", level: "warn" },
  { group: "nursery", level: "warn" }
];

export const EXHAUSTIVE_GROUP: LintGroup = "restriction";
export const EXHAUSTIVE_DEFAULT_LEVEL: LintLevel = "allow";

export const RESTRICTION_EXCEPTIONS: Exceptions = {
  level: "warn",
  lints: restrictionExceptions
};

export function allowLists(profile: Profile): AllowList[] {
  return [
    {
      group: "pedantic",
      comment: "pedantic overrides",
      lints: ["too_many_lines", "must_use_candidate", "map_unwrap_or", "missing_errors_doc", "if_not_else"]
    },
    {
      group: "nursery",
      comment: "nursery overrides",
      lints: ["missing_const_for_fn", "option_if_let_else", "redundant_pub_crate"]
    },
    {
      group: "complexity",
      comment: "complexity overrides",
      lints: ["too_many_arguments"]
    },
    {
      group: "style",
      comment: "style overrides",
      lints: ["new_without_default", "redundant_closure"]
    },
    {
      group: "cargo",
      comment: "cargo overrides",
      lints: profile === "personal"
        ? ["multiple_crate_versions", "cargo_common_metadata"]
        : ["multiple_crate_versions"]
    }
  ];
}
