export type LintGroup =
  | "cargo"
  | "complexity"
  | "correctness"
  | "nursery"
  | "pedantic"
  | "perf"
  | "restriction"
  | "style"
  | "suspicious"
  | "deprecated";

export type LintLevel = "allow" | "warn" | "deny" | "none";
export type Profile = "publish" | "personal";

export type LintId = string;

export interface CatalogEntry {
  id: LintId;
  group: LintGroup;
  default_level: LintLevel;
  version: string;
}

export type PrioritySetting = { kind: "explicit"; value: number } | { kind: "unspecified" };

export interface SingleSetting {
  kind: "single";
  lint: LintId;
  priority: PrioritySetting;
  level: LintLevel;
}

export interface GroupSetting {
  kind: "group";
  group: LintGroup;
  priority: PrioritySetting;
  level: LintLevel;
}

export type Setting = SingleSetting | GroupSetting;

export interface ConfigGroup {
  comment?: string;
  settings: Setting[];
}

export type Config = ConfigGroup[];

export interface Exceptions {
  level: LintLevel;
  lints: LintId[];
}

export interface ExhaustiveGroup {
  defaults: Setting[];
  exceptions: Setting[];
}

export interface CliOptions {
  command: "generate" | "help" | "version";
  profile?: Profile;
  workspace?: boolean;
  configPath?: string;
  catalogUrl?: string;
  timeoutMs?: number;
  debug: boolean;
}

export interface ConfigFile {
  catalog?: {
    url?: string;
    timeout_ms?: number;
  };
  output?: {
    workspace?: boolean;
  };
}

export interface EffectiveConfig {
  profile: Profile;
  workspace: boolean;
  catalogUrl: string;
  timeoutMs: number;
  debug: boolean;
}
