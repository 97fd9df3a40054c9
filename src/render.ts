import { Config, Setting } from "./types";

function formatSetting(setting: Setting): string {
  const key = setting.kind === "single" ? setting.lint : setting.group;
  if (setting.priority.kind === "explicit") {
    return `${key} = { level = "${setting.level}", priority = ${setting.priority.value} }`;
  }
  return `${key} = "${setting.level}"`;
}

/**
 * Renders the config as a Cargo manifest lint table. Groups are separated by
 * one blank line and the output carries no trailing newline after the last
 * setting.
 */
export function renderConfig(config: Config, workspace: boolean): string {
  let output = workspace ? "[workspace.lints.clippy]\n" : "[lints.clippy]\n";

  config.forEach((group, groupIndex) => {
    const lastGroup = groupIndex === config.length - 1;
    if (group.comment !== undefined) {
      output += `# ${group.comment}\n`;
    }

    group.settings.forEach((setting, settingIndex) => {
      const lastSetting = settingIndex === group.settings.length - 1;
      output += formatSetting(setting);
      if (!lastSetting || !lastGroup) {
        output += "\n";
      }
    });

    if (!lastGroup) {
      output += "\n";
    }
  });

  return output;
}
