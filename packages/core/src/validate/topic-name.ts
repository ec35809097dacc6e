// ── Topic name grammar ──────────────────────────────────────────────
//
//   <domain>://<tenant>/<namespace>/<local>            (v2)
//   <domain>://<tenant>/<cluster>/<namespace>/<local>  (v1)
//   <tenant>/<namespace>/<local>                       (short, persistent)
//   <local>                                            (short, public/default)

export const TOPIC_DOMAINS: readonly string[] = ['persistent', 'non-persistent'];

const NAMED_ENTITY = /^[-=:.\w]+$/;

export interface ParsedTopicName {
  readonly domain: string;
  readonly tenant: string;
  readonly cluster?: string;
  readonly namespace: string;
  readonly localName: string;
}

export function parseTopicName(topic: string): ParsedTopicName | null {
  if (topic.trim().length === 0) return null;

  let domain = 'persistent';
  let rest = topic;

  const schemeIdx = topic.indexOf('://');
  if (schemeIdx >= 0) {
    domain = topic.slice(0, schemeIdx);
    rest = topic.slice(schemeIdx + 3);
    if (!TOPIC_DOMAINS.includes(domain)) return null;
  } else if (!topic.includes('/')) {
    rest = `public/default/${topic}`;
  }

  const parts = rest.split('/');
  if (parts.length === 3) {
    const [tenant, namespace, localName] = parts;
    if (!NAMED_ENTITY.test(tenant) || !NAMED_ENTITY.test(namespace) || localName.length === 0) {
      return null;
    }
    return { domain, tenant, namespace, localName };
  }

  if (parts.length === 4 && schemeIdx >= 0) {
    const [tenant, cluster, namespace, localName] = parts;
    if (
      !NAMED_ENTITY.test(tenant) ||
      !NAMED_ENTITY.test(cluster) ||
      !NAMED_ENTITY.test(namespace) ||
      localName.length === 0
    ) {
      return null;
    }
    return { domain, tenant, cluster, namespace, localName };
  }

  return null;
}

export function isValidTopicName(topic: string): boolean {
  return parseTopicName(topic) !== null;
}
