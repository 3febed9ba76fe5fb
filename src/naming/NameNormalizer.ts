// <stem>.<YYYY>-<MM>-<DD>_<HHMMSS>.bak
const BACKUP_NAME_PATTERN = /^(.*)\.(\d{4})-(\d{2})-(\d{2})_(\d{2})(\d{2})(\d{2})\.bak$/

export const BACKUP_EXTENSION = '.bak'

/**
 * Derive the logical name a file is grouped under.
 *
 * A backup name loses its timestamp suffix and keeps the rest verbatim
 * (`report.txt.2024-01-02_100000.bak` -> `report.txt`). Any other name is cut
 * at its first dot (`report.txt` -> `report`), so a live file whose real name
 * contains a dot (`v1.2-notes.txt` -> `v1`) is grouped loosely.
 */
export function baseName(filename: string): string {
  const match = BACKUP_NAME_PATTERN.exec(filename)
  if (match) {
    return match[1]
  }
  return filename.split('.')[0]
}

export function isBackupName(filename: string): boolean {
  return BACKUP_NAME_PATTERN.test(filename)
}

/**
 * The local time encoded in a backup name's suffix, or null when the name
 * has no suffix or encodes an impossible date.
 */
export function backupTimestamp(filename: string): Date | null {
  const match = BACKUP_NAME_PATTERN.exec(filename)
  if (!match) {
    return null
  }

  const [year, month, day, hours, minutes, seconds] = match.slice(2).map(Number)
  const date = new Date(year, month - 1, day, hours, minutes, seconds)
  const roundTrips =
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day &&
    date.getHours() === hours &&
    date.getMinutes() === minutes &&
    date.getSeconds() === seconds
  return roundTrips ? date : null
}
