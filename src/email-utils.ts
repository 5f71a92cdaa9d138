// Address headers parsed with email-addresses (RFC 5322).
// Groups are flattened to their mailboxes. A header that does not parse gives
// no addresses at all; nothing here invents a placeholder recipient.

import { parseAddressList, parseFrom } from 'email-addresses'

export interface Address {
  name: string
  email: string
}

interface ParsedEntry {
  type: string
  name?: string | null
  address?: string | null
  addresses?: Array<{ name?: string | null; address?: string | null }>
}

function flatten(entries: ParsedEntry[]): Address[] {
  return entries.flatMap((entry) => {
    const mailboxes = entry.type === 'group' ? entry.addresses ?? [] : [entry]
    return mailboxes.flatMap((m) => (m.address ? [{ name: m.name ?? '', email: m.address }] : []))
  })
}

/** Mailboxes of a To/Cc/Reply-To style header. */
export function parseAddresses(header: string | undefined): Address[] {
  if (!header) return []
  return flatten(parseAddressList(header) ?? [])
}

/** First mailbox of a From header. The From grammar tolerates a few forms
 *  the plain address-list grammar rejects. */
export function parseSender(header: string | undefined): Address | null {
  if (!header) return null
  return flatten(parseFrom(header) ?? [])[0] ?? parseAddresses(header)[0] ?? null
}

/** A single bare address such as `bob@example.com`: no display name, no
 *  whitespace or line breaks, nothing a header could be extended with. */
export function isPlainAddress(value: string): boolean {
  if (/\s/.test(value)) return false
  const parsed = parseAddresses(value)
  return parsed.length === 1 && parsed[0]?.email === value
}

/** Where a reply goes: Reply-To when present and valid, otherwise From. */
export function replyRecipient(headers: { replyTo?: string; from?: string }): Address | null {
  return parseAddresses(headers.replyTo)[0] ?? parseSender(headers.from)
}

/** Case-insensitive substring match on "name email". `value` is lowercase. */
export function addressMatches(address: Address, value: string): boolean {
  return `${address.name} ${address.email}`.toLowerCase().includes(value)
}
