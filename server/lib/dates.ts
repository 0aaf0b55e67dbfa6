export type CalendarMonth = {
  year: number
  /** 1-12 */
  month: number
}

const isoDatePattern = /^(\d{4})-(\d{2})-(\d{2})$/

const dateWithClampedDay = (year: number, month: number, day: number) => {
  const daysInMonth = new Date(year, month + 1, 0).getDate()
  return new Date(year, month, Math.min(day, daysInMonth))
}

export const addCalendarMonthsKeepingDay = (date: Date, months: number) =>
  dateWithClampedDay(date.getFullYear(), date.getMonth() + months, date.getDate())

export const toCalendarMonth = (date: Date): CalendarMonth => ({
  year: date.getFullYear(),
  month: date.getMonth() + 1,
})

export const toIsoDate = (date: Date) =>
  `${date.getFullYear()}-${String(date.getMonth() + 1).padStart(2, '0')}-${String(date.getDate()).padStart(2, '0')}`

/** Parses `YYYY-MM-DD` as a local calendar date. Returns null for malformed or impossible dates. */
export const parseIsoDate = (value: string) => {
  const match = isoDatePattern.exec(value)
  if (!match) {
    return null
  }

  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  const date = new Date(year, month - 1, day)
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null
  }

  return date
}

const monthLabelFormatter = new Intl.DateTimeFormat('en-US', { month: 'long', year: 'numeric' })

export const formatMonthLabel = (date: Date) => monthLabelFormatter.format(date)
