// Output formatting utilities for the mailwright CLI.
// Results a script may consume go to stdout; hints, progress and errors go to
// stderr so they never mix into piped output.
// Structured data (ledger listings, auth status) is printed as YAML (js-yaml);
// in TTY mode keys are dimmed, in non-TTY mode the YAML stays plain so piped
// output is machine-parseable. HTML-only email bodies are converted to
// markdown (turndown) before they reach the decision policy.

import yaml from 'js-yaml'
import TurndownService from 'turndown'
import pc from 'picocolors'
import {
  AuthError,
  CorruptStoreError,
  FlowTimeoutError,
  UserDeclinedError,
} from './api-utils.js'

const isTTY = process.stdout.isTTY ?? false

// ---------------------------------------------------------------------------
// Exit codes for the host process
// ---------------------------------------------------------------------------

export const EXIT_CODES = {
  ok: 0,
  error: 1,
  auth: 2,
  corruptStore: 3,
} as const

// ---------------------------------------------------------------------------
// Turndown instance (HTML -> Markdown)
// ---------------------------------------------------------------------------

const turndown = new TurndownService({
  headingStyle: 'atx',
  codeBlockStyle: 'fenced',
  bulletListMarker: '-',
})

// Strip <style>, <head>, <script> tags
turndown.addRule('strip-style', {
  filter: ['style', 'head', 'script'],
  replacement: () => '',
})

// Simplify images to [image: alt]
turndown.addRule('images', {
  filter: 'img',
  replacement: (_content, node) => {
    const alt = node.getAttribute('alt') ?? ''
    return alt ? `[image: ${alt}]` : ''
  },
})

// Strip tracking pixels and tiny images. Turndown tries the most recently
// added rule first, so this runs ahead of the images rule
turndown.addRule('tracking-pixels', {
  filter: (node) => {
    if (node.nodeName !== 'IMG') return false
    const width = node.getAttribute('width')
    const height = node.getAttribute('height')
    if ((width === '1' || width === '0') && (height === '1' || height === '0')) return true
    const src = node.getAttribute('src') ?? ''
    return src.includes('track') || src.includes('pixel') || src.includes('beacon')
  },
  replacement: () => '',
})

// Strip quoted-reply wrappers from Gmail/Outlook so the policy sees only the
// newest message in the thread
turndown.addRule('quoted-replies', {
  filter: (node) => {
    const cls = node.getAttribute('class') ?? ''
    if (node.nodeName === 'DIV') {
      if (/(^|\s)gmail_(quote|extra)(\s|$)/.test(cls)) return true
      const id = node.getAttribute('id') ?? ''
      if (id === 'appendonsend' || id === 'divRplyFwdMsg') return true
    }
    return node.nodeName === 'BLOCKQUOTE' && node.getAttribute('type') === 'cite'
  },
  replacement: () => '',
})

export function htmlToMarkdown(html: string): string {
  // Pre-clean: remove common email noise
  const cleaned = html
    .replace(/<!--[\s\S]*?-->/g, '') // HTML comments
    .replace(/<o:p>[\s\S]*?<\/o:p>/gi, '') // Outlook tags
    .replace(/<!\[if[\s\S]*?<!\[endif\]>/gi, '') // Outlook conditional comments

  return turndown
    .turndown(cleaned)
    .replace(/[\u00A0\u200B\u200C\u200D\uFEFF]/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim()
}

export function renderEmailBody(body: string, mimeType: string): string {
  if (mimeType === 'text/html') {
    return htmlToMarkdown(body)
  }
  return body.trim()
}

// ---------------------------------------------------------------------------
// YAML output
// ---------------------------------------------------------------------------

function colorizeYaml(yamlStr: string): string {
  return yamlStr.replace(
    /^(\s*)(- )?([\w_][\w_ ]*?)(:)/gm,
    (_match, indent: string, dash: string | undefined, key: string, colon: string) => {
      const prefix = dash ? `${indent}${pc.cyan(dash)}` : indent
      return `${prefix}${pc.dim(key)}${pc.dim(colon)}`
    },
  )
}

/** Print any value as YAML to stdout. */
export function printYaml(data: unknown): void {
  const str = yaml.dump(data, {
    lineWidth: -1,
    noRefs: true,
    quotingType: "'",
    sortKeys: false,
  })

  process.stdout.write(isTTY ? colorizeYaml(str) : str)
}

export function printList(
  items: Record<string, unknown>[],
  opts?: { summary?: string },
): void {
  printYaml({ items })
  if (opts?.summary) hint(opts.summary)
}

// ---------------------------------------------------------------------------
// Stderr diagnostics
// ---------------------------------------------------------------------------

export function hint(msg: string): void {
  process.stderr.write(pc.dim(`# ${msg}`) + '\n')
}

export function success(msg: string): void {
  process.stderr.write(pc.green(msg) + '\n')
}

export function warn(msg: string): void {
  process.stderr.write(pc.yellow(msg) + '\n')
}

export function error(msg: string): void {
  process.stderr.write(pc.red(msg) + '\n')
}

export function exitCodeFor(err: Error): number {
  if (err instanceof AuthError || err instanceof UserDeclinedError || err instanceof FlowTimeoutError) {
    return EXIT_CODES.auth
  }
  if (err instanceof CorruptStoreError) return EXIT_CODES.corruptStore
  return EXIT_CODES.error
}

export function handleCommandError(err: Error): never {
  if (err instanceof AuthError) {
    error(`${err.message}. Try: mailwright login`)
  } else if (err instanceof CorruptStoreError) {
    error(`${err.message}. Inspect or remove the file by hand; it is never repaired automatically`)
  } else {
    error(err.message)
  }
  process.exit(exitCodeFor(err))
}
