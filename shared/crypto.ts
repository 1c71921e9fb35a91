import { createHash, randomUUID } from 'node:crypto';

export const randomId = (): string => randomUUID();

// RFC 4122 DNS namespace.
const DNS_NAMESPACE = '6ba7b810-9dad-11d1-80b4-00c04fd430c8';

const uuidToBytes = (uuid: string): Buffer => Buffer.from(uuid.replace(/-/g, ''), 'hex');

const formatUuid = (hex: string): string =>
  `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;

/** Name-based (version 5) UUID: same name, same id. */
export const uuidV5 = (name: string, namespace: string = DNS_NAMESPACE): string => {
  const hash = createHash('sha1')
    .update(uuidToBytes(namespace))
    .update(Buffer.from(name, 'utf8'))
    .digest();
  hash[6] = (hash[6] & 0x0f) | 0x50;
  hash[8] = (hash[8] & 0x3f) | 0x80;
  return formatUuid(hash.subarray(0, 16).toString('hex'));
};

export const articleIdFor = (title: string, sourceName: string): string => uuidV5(JSON.stringify([title, sourceName]));
