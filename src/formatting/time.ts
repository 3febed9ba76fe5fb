const WEEKDAYS = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat']

const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0')

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`, the stamp written into audit entries.
 */
export function formatAuditTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${day} ${time}`
}

/**
 * Local time as shown in version listings: `tue 01/02/2024 09:05am`.
 */
export function formatDisplayTime(date: Date): string {
  const hours = date.getHours()
  const hours12 = hours % 12 === 0 ? 12 : hours % 12
  const meridiem = hours < 12 ? 'am' : 'pm'
  const day = `${pad(date.getMonth() + 1)}/${pad(date.getDate())}/${date.getFullYear()}`
  return `${WEEKDAYS[date.getDay()]} ${day} ${pad(hours12)}:${pad(date.getMinutes())}${meridiem}`
}
