/**
 * Vaultsmith CLI - Colors Utility
 *
 * Terminal colors using tuiuiu.js text-utils.
 * Supports NO_COLOR and FORCE_COLOR environment variables
 */

import {
  colorize,
  style,
  styles as tuiStyles,
  stripAnsi
} from 'tuiuiu.js'

type StyleName = keyof typeof tuiStyles

// Check if colors should be enabled
const isColorEnabled = (): boolean => {
  // Respect NO_COLOR standard
  if (process.env.NO_COLOR !== undefined) return false
  // Respect FORCE_COLOR
  if (process.env.FORCE_COLOR !== undefined) return true
  // Check if stderr is a TTY (progress is written there)
  return process.stderr.isTTY ?? false
}

const enabled = isColorEnabled()

// Wrapper that respects NO_COLOR
const color = (text: string, col: string): string => {
  if (!enabled) return text
  return colorize(text, col)
}

const styled = (text: string, ...styleNames: StyleName[]): string => {
  if (!enabled) return text
  return style(text, ...styleNames)
}

export { stripAnsi }

// Semantic colors
export const c = {
  success: (text: string) => color(text, 'greenBright'),
  error: (text: string) => color(text, 'redBright'),
  info: (text: string) => color(text, 'cyan'),

  label: (text: string) => color(text, 'gray'),
  muted: (text: string) => styled(text, 'dim')
}

export const symbols = {
  success: enabled ? c.success('✓') : '[OK]',
  arrow: enabled ? c.info('=>') : '=>'
}

// Print utilities (stderr keeps stdout clean for --json)
export const print = {
  success: (msg: string) => console.error(`${symbols.success} ${c.success(msg)}`)
}
