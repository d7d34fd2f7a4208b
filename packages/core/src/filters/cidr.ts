import { Address4, Address6 } from "ip-address";
import type { Logger } from "pino";
import type { Entry, SizeCriteria } from "../schemas/prefix-list.js";
import { InvalidCidrError } from "../errors/catalog.js";

export interface ParsedCidr {
  family: 4 | 6;
  /** Network address with any host bits cleared. */
  network: string;
  prefixLength: number;
}

export interface Classification {
  oversized: Entry[];
  invalid: Entry[];
}

const PREFIX_LENGTH_PATTERN = /^\d{1,3}$/;
const IPV4_OCTET_PATTERN = /^(0|[1-9]\d{0,2})$/;

function hasCanonicalOctets(address: string): boolean {
  const octets = address.split(".");
  return octets.length === 4 && octets.every((o) => IPV4_OCTET_PATTERN.test(o));
}

/**
 * Parses an `address/prefixLength` block. Host bits in the address are
 * accepted and cleared in `network`. Returns null for anything that is not a
 * valid IPv4 or IPv6 network, including IPv4 octets with leading zeros.
 */
export function parseCidr(block: string): ParsedCidr | null {
  const [address, prefix, ...rest] = block.split("/");
  if (prefix === undefined || rest.length > 0) {
    return null;
  }
  if (!PREFIX_LENGTH_PATTERN.test(prefix)) {
    return null;
  }
  const prefixLength = Number(prefix);

  if (!address.includes(":")) {
    if (!hasCanonicalOctets(address) || !Address4.isValid(address)) {
      return null;
    }
    if (prefixLength > 32) return null;
    const network = new Address4(`${address}/${prefixLength}`).startAddress();
    return { family: 4, network: network.correctForm(), prefixLength };
  }

  if (Address6.isValid(address)) {
    if (prefixLength > 128) return null;
    const network = new Address6(`${address}/${prefixLength}`).startAddress();
    return { family: 6, network: network.correctForm(), prefixLength };
  }

  return null;
}

/**
 * True when the block covers more address space than `maxPrefixLength`,
 * i.e. its prefix length is strictly smaller. Unparsable blocks are never
 * oversized.
 */
export function isOversized(block: string, maxPrefixLength: number): boolean {
  const parsed = parseCidr(block);
  return parsed !== null && parsed.prefixLength < maxPrefixLength;
}

export function classifyEntries(
  entries: Entry[],
  { maxPrefixLength }: SizeCriteria,
): Classification {
  const oversized: Entry[] = [];
  const invalid: Entry[] = [];

  for (const entry of entries) {
    const parsed = parseCidr(entry.block ?? "");
    if (parsed === null) {
      invalid.push(entry);
    } else if (parsed.prefixLength < maxPrefixLength) {
      oversized.push(entry);
    }
  }

  return { oversized, invalid };
}

/**
 * Returns the entries whose block is larger than /maxPrefixLength, in input
 * order. Entries with a malformed block are dropped and logged.
 */
export function filterOversizedEntries(
  entries: Entry[],
  criteria: SizeCriteria,
  logger?: Logger,
): Entry[] {
  const { maxPrefixLength } = criteria;
  const { oversized, invalid } = classifyEntries(entries, criteria);

  for (const entry of invalid) {
    const err = new InvalidCidrError(entry.block ?? "");
    logger?.warn({ errorCode: err.errorCode, ...err.details }, err.message);
  }
  logger?.info(
    { matched: oversized.length, skipped: invalid.length, maxPrefixLength },
    `Filtered ${oversized.length} entries with CIDR larger than /${maxPrefixLength}`,
  );

  return oversized;
}
