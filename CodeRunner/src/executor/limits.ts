/**
 * Resource limits applied at spawn time through a POSIX `sh` prelude.
 *
 * The prelude sets each `ulimit`, reports any the host refuses on fd 3, checks
 * that the target binary exists, closes fd 3 and `exec`s the command. The
 * command itself arrives as positional parameters and is never re-parsed by
 * the shell.
 */

export interface ResourceLimits {
  /** Shell used to run the prelude. */
  shell: string;
  cpuSeconds?: number;
  memoryMb?: number;
  maxProcesses?: number;
  maxFileBytes?: number;
}

/** Name used as `$0` inside the prelude, shows up in shell error messages. */
export const PRELUDE_NAME = 'sandbox';

/** Side-channel line prefixes written to fd 3. */
export const LIMIT_PREFIX = 'limit:';
export const MISSING_PREFIX = 'missing:';

function tryLimit(args: string, name: string): string {
  return `ulimit ${args} 2>/dev/null || echo "${LIMIT_PREFIX}${name}" >&3`;
}

export function buildLimitPrelude(limits: ResourceLimits): string {
  const lines: string[] = [];

  if (limits.cpuSeconds !== undefined) {
    lines.push(tryLimit(`-t ${limits.cpuSeconds}`, 'cpu'));
  }
  if (limits.memoryMb !== undefined) {
    lines.push(tryLimit(`-v ${limits.memoryMb * 1024}`, 'memory'));
  }
  if (limits.maxFileBytes !== undefined) {
    // POSIX sh counts -f in 512-byte blocks
    lines.push(tryLimit(`-f ${Math.max(1, Math.floor(limits.maxFileBytes / 512))}`, 'fileSize'));
  }
  if (limits.maxProcesses !== undefined) {
    // bash and busybox take -u; dash spells the same limit -p
    const n = limits.maxProcesses;
    lines.push(
      `ulimit -u ${n} 2>/dev/null || ulimit -p ${n} 2>/dev/null || echo "${LIMIT_PREFIX}processes" >&3`,
    );
  }

  lines.push(`command -v "$1" >/dev/null 2>&1 || { echo "${MISSING_PREFIX}$1" >&3; exit 127; }`);
  lines.push('exec 3>&-');
  lines.push('exec "$@"');
  return lines.join('\n');
}

/**
 * argv for spawning `command` under the prelude.
 */
export function wrapWithLimits(command: readonly string[], limits: ResourceLimits): [string, string[]] {
  return [limits.shell, ['-c', buildLimitPrelude(limits), PRELUDE_NAME, ...command]];
}

export interface SideChannelReport {
  refusedLimits: string[];
  missingCommand?: string;
}

export function parseSideChannel(text: string): SideChannelReport {
  const report: SideChannelReport = { refusedLimits: [] };
  for (const line of text.split('\n')) {
    if (line.startsWith(LIMIT_PREFIX)) {
      report.refusedLimits.push(line.slice(LIMIT_PREFIX.length));
    } else if (line.startsWith(MISSING_PREFIX)) {
      report.missingCommand = line.slice(MISSING_PREFIX.length);
    }
  }
  return report;
}
