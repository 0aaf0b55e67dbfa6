const MINOR_UNITS_PER_MAJOR = 100

export const roundCurrency = (value: number) => Math.round(value * 100) / 100

export const toMinorUnits = (amount: number) => Math.round(amount * MINOR_UNITS_PER_MAJOR)

export const toMajorUnits = (minor: number) => minor / MINOR_UNITS_PER_MAJOR

export const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value))

export const clampPercent = (value: number) => clamp(value, 0, 100)
