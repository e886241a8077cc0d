import pc from 'picocolors'
import { type DisplaySchema, formatters } from './output.js'

/** Result of `bytewise parse` */
export interface ParsedRow {
  readonly input: string
  readonly bytes: number
  readonly unit: string
  readonly suffix: boolean
  readonly standard: string
}

/** Result of `bytewise convert` */
export interface ConversionRow {
  readonly input: string
  readonly from: string
  readonly result: string
  readonly to: string
  readonly bytes: number
}

/** Result of `bytewise calc` */
export interface CalcRow {
  readonly expression: string
  readonly result: string
  readonly bytes: number
  readonly standard: string
}

export type Relation = '<' | '=' | '>'

/** Result of `bytewise compare` */
export interface ComparisonRow {
  readonly left: string
  readonly relation: Relation
  readonly right: string
}

export const ParsedDisplay: DisplaySchema<ParsedRow> = {
  columns: [
    { key: 'input', label: 'Input', width: 16, format: formatters.truncate(16), color: () => pc.dim },
    { key: 'bytes', label: 'Bytes', width: 24, format: formatters.bytes, color: () => pc.bold },
    { key: 'unit', label: 'Unit', width: 6, color: () => pc.cyan },
    {
      key: 'suffix',
      label: 'Suffix',
      width: 6,
      format: formatters.flag,
      color: (v) => (v === true ? pc.green : pc.dim),
    },
    { key: 'standard', label: 'Standard', width: 8, color: () => pc.dim },
  ],
}

export const ConversionDisplay: DisplaySchema<ConversionRow> = {
  columns: [
    { key: 'input', label: 'Input', width: 16, color: () => pc.dim },
    { key: 'from', label: 'From', width: 8, color: () => pc.dim },
    { key: 'result', label: 'Result', width: 16, color: () => pc.bold },
    { key: 'to', label: 'To', width: 8, color: () => pc.cyan },
    { key: 'bytes', label: 'Bytes', width: 24, format: formatters.bytes },
  ],
}

export const CalcDisplay: DisplaySchema<CalcRow> = {
  columns: [
    { key: 'expression', label: 'Expression', width: 28, format: formatters.truncate(28), color: () => pc.dim },
    { key: 'result', label: 'Result', width: 16, color: () => pc.bold },
    { key: 'bytes', label: 'Bytes', width: 24, format: formatters.bytes },
    { key: 'standard', label: 'Standard', width: 8, color: () => pc.cyan },
  ],
}

export const ComparisonDisplay: DisplaySchema<ComparisonRow> = {
  columns: [
    { key: 'left', label: 'Left', width: 16 },
    {
      key: 'relation',
      label: 'Rel',
      width: 3,
      color: (v) => (v === '=' ? pc.green : pc.yellow),
    },
    { key: 'right', label: 'Right', width: 16 },
  ],
}
