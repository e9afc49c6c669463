import type { NodeResolver } from './ColorContrastDetector.js';

export const BLOCK_ID_PREFIX = 'block-';

export function getBlockDOMNode(clientId: string, doc: Document = document): HTMLElement | null {
  if (!clientId) return null;
  return doc.getElementById(BLOCK_ID_PREFIX + clientId);
}

export function createBlockNodeResolver(doc: Document = document): NodeResolver {
  return (clientId: string) => getBlockDOMNode(clientId, doc);
}
