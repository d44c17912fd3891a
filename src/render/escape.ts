const XML_ENTITIES: Record<string, string> = { '&': '&amp;', '<': '&lt;', '>': '&gt;', '"': '&quot;', "'": '&apos;' };

export function escapeXml(s: string) {
    return s.replace(/[&<>"']/g, (c) => XML_ENTITIES[c] ?? c);
}

/** Escaped href; anything that is not http(s) becomes "#". */
export function safeHref(url: string) {
    return /^https?:\/\//i.test(url.trim()) ? escapeXml(url.trim()) : '#';
}
