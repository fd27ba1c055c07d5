import { ConfigurationError } from './errors'

// RouterOS export parsing and diffing.
// An export is a list of sections ("/ip address") each holding command lines
// ("add address=192.0.2.1/24 interface=ether1", "set [ find default-name=ether1 ] mtu=1500").

export interface Argument {
  key: string
  value: string | null  // null for bare words such as "disabled"
}

export interface Expression {
  command: string
  selector: string | null  // "[ find default-name=ether1 ]" or a bare item name
  args: Argument[]
}

export interface Section {
  path: string
  expressions: Expression[]
}

function tokenize(line: string): string[] {
  const tokens: string[] = []
  let current = ''
  let quoted = false
  let depth = 0

  for (let i = 0; i < line.length; i++) {
    const c = line[i]
    if (quoted) {
      current += c
      if (c === '\\' && i + 1 < line.length) {
        current += line[++i]
      } else if (c === '"') {
        quoted = false
      }
      continue
    }
    if (c === '"') {
      quoted = true
      current += c
    } else if (c === '[') {
      depth++
      current += c
    } else if (c === ']') {
      depth = Math.max(0, depth - 1)
      current += c
    } else if (c === ' ' && depth === 0) {
      if (current) tokens.push(current)
      current = ''
    } else {
      current += c
    }
  }
  if (current) tokens.push(current)
  return tokens
}

function parseExpression(line: string): Expression {
  const [command, ...rest] = tokenize(line)
  let selector: string | null = null
  const args: Argument[] = []

  for (const token of rest) {
    const eq = token.indexOf('=')
    if (eq > 0 && !token.startsWith('[')) {
      args.push({ key: token.slice(0, eq), value: token.slice(eq + 1) })
    } else if (selector === null && args.length === 0) {
      selector = token
    } else {
      args.push({ key: token, value: null })
    }
  }
  return { command: command ?? '', selector, args }
}

export function formatExpression(expr: Expression): string {
  const parts = [expr.command]
  if (expr.selector) parts.push(expr.selector)
  for (const arg of expr.args) {
    parts.push(arg.value === null ? arg.key : `${arg.key}=${arg.value}`)
  }
  return parts.join(' ')
}

// Order-independent identity of an expression
function expressionKey(expr: Expression): string {
  const args = expr.args.map(a => (a.value === null ? a.key : `${a.key}=${a.value}`)).sort()
  return [expr.command, expr.selector ?? '', ...args].join(' ')
}

function argValue(expr: Expression, key: string): string | null | undefined {
  return expr.args.find(a => a.key === key)?.value
}

// Join "\" continuations and drop comments and blank lines
function logicalLines(text: string): string[] {
  const lines: string[] = []
  let pending = ''
  for (const raw of text.split(/\r?\n/)) {
    const line = pending ? `${pending}${raw.trimStart()}` : raw.trim()
    if (line.endsWith('\\')) {
      pending = line.slice(0, -1)
      continue
    }
    pending = ''
    if (!line || line.startsWith('#')) continue
    lines.push(line)
  }
  if (pending) lines.push(pending)
  return lines
}

export class RouterOSConfig {
  constructor(readonly sections: Section[]) {}

  static parse(text: string): RouterOSConfig {
    const sections: Section[] = []
    let current: Section | null = null

    for (const line of logicalLines(text)) {
      if (line.startsWith('/')) {
        const path = line.replace(/\s+/g, ' ')
        current = sections.find(s => s.path === path) ?? null
        if (!current) {
          current = { path, expressions: [] }
          sections.push(current)
        }
        continue
      }
      if (!current) {
        throw new ConfigurationError(`Command outside of a section: ${line}`)
      }
      current.expressions.push(parseExpression(line))
    }
    return new RouterOSConfig(sections)
  }

  section(path: string): Section | undefined {
    return this.sections.find(s => s.path === path)
  }

  // Script that turns `old` into this configuration.
  // Sections absent from this configuration are left untouched.
  diff(old: RouterOSConfig, oldVerbose?: RouterOSConfig): ConfigDiff {
    const sections: Section[] = []

    for (const section of this.sections) {
      const before = old.section(section.path)?.expressions ?? []
      const verbose = oldVerbose?.section(section.path)?.expressions ?? []
      const expressions = diffSection(section.expressions, before, verbose)
      if (expressions.length > 0) {
        sections.push({ path: section.path, expressions })
      }
    }
    return new ConfigDiff(sections)
  }

  toString(): string {
    return renderSections(this.sections)
  }
}

export class ConfigDiff {
  constructor(readonly sections: Section[]) {}

  get isEmpty(): boolean {
    return this.sections.length === 0
  }

  toString(): string {
    return renderSections(this.sections)
  }
}

function renderSections(sections: Section[]): string {
  return sections
    .map(s => [s.path, ...s.expressions.map(formatExpression)].join('\n'))
    .join('\n')
}

function findByName(name: string): string {
  return `[ find name=${name} ]`
}

function diffSection(after: Expression[], before: Expression[], verbose: Expression[]): Expression[] {
  const beforeKeys = new Set(before.map(expressionKey))
  const afterKeys = new Set(after.map(expressionKey))
  const removals: Expression[] = []
  const changes: Expression[] = []

  // Items added before but no longer wanted
  for (const expr of before) {
    if (expr.command !== 'add' || afterKeys.has(expressionKey(expr))) continue
    const name = argValue(expr, 'name')
    if (name && after.some(a => a.command === 'add' && argValue(a, 'name') === name)) continue

    const where = expr.args
      .filter(a => a.value !== null)
      .map(a => `${a.key}=${a.value}`)
      .join(' ')
    removals.push({
      command: 'remove',
      selector: name ? findByName(name) : `[ find where ${where} ]`,
      args: [],
    })
  }

  // Settings dropped from the candidate fall back to the verbose (default) values
  for (const expr of before) {
    if (expr.command !== 'set' || afterKeys.has(expressionKey(expr))) continue
    const replacement = after.find(a => a.command === 'set' && a.selector === expr.selector)
    const defaults = verbose.find(v => v.command === 'set' && v.selector === expr.selector)
    if (!defaults) continue

    const reset = expr.args
      .filter(arg => !replacement?.args.some(a => a.key === arg.key))
      .map(arg => defaults.args.find(d => d.key === arg.key))
      .filter((arg): arg is Argument => arg !== undefined)
    if (reset.length > 0) {
      changes.push({ command: 'set', selector: expr.selector, args: reset })
    }
  }

  for (const expr of after) {
    if (beforeKeys.has(expressionKey(expr))) continue

    // Named item that already exists: update it in place
    const name = expr.command === 'add' ? argValue(expr, 'name') : undefined
    const existing = name ? before.find(b => b.command === 'add' && argValue(b, 'name') === name) : undefined
    if (name && existing) {
      const changed = expr.args.filter(arg => arg.key !== 'name' && argValue(existing, arg.key) !== arg.value)
      if (changed.length > 0) {
        changes.push({ command: 'set', selector: findByName(name), args: changed })
      }
      continue
    }

    // A set that only adds or changes some arguments of an existing set
    const previous = expr.command === 'set' ? before.find(b => b.command === 'set' && b.selector === expr.selector) : undefined
    if (previous) {
      const changed = expr.args.filter(arg => argValue(previous, arg.key) !== arg.value)
      if (changed.length > 0) {
        changes.push({ command: 'set', selector: expr.selector, args: changed })
      }
      continue
    }

    changes.push(expr)
  }

  return [...removals, ...changes]
}
