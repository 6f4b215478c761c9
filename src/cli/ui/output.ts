/**
 * Styled output helpers
 */

import color from "picocolors";

export { color };

export function usage(scriptName: string): string {
  return `
${color.bold(scriptName)} - Mirror your home directory with rsync

${color.dim("USAGE:")}
  ${scriptName} [OPTIONS]

${color.dim("OPTIONS:")}
  -v, --verbose    Enable verbose output from rsync
  -d, --dry-run    Simulate backup without making actual changes
  -h, --help       Display this help message and exit

${color.dim("CONFIGURATION:")}
  Settings are read from ${scriptName}.conf (or ${scriptName}.config.yaml,
  .yml, .json) next to the executable, or in $HOMESYNC_HOME when set:

    SOURCE_DIR="$HOME"
    BACKUP_DIR="/mnt/backup/home"
    EXCLUDE_FILE="./exclude.txt"

${color.dim("EXAMPLES:")}
  ${scriptName} --verbose
  ${scriptName} -d
`;
}

export function printUsage(scriptName: string): void {
  console.log(usage(scriptName));
}

/**
 * Report a failure that happens before the session log exists
 */
export function fatal(
  message: string,
  useColor: boolean = color.isColorSupported,
): void {
  const palette = color.createColors(useColor);
  console.error(`${palette.red("FATAL:")} ${message}`);
}
