import { RemoteFault } from '@dedbg/core';
import {
  childElements,
  element,
  getAttribute,
  textContent,
  withAttribute,
  type XmlElement,
} from './xml-document.js';

/** Attribute carrying the request token on envelopes and replies. */
export const TOKEN_ATTRIBUTE = 'token';

/** Token value reserved for unsolicited server notifications. */
export const NOTIFICATION_TOKEN = 0;

/** Largest token the server accepts (signed 32-bit). */
export const MAX_TOKEN = 0x7fffffff;

/** Root tag of a reply that reports a remote exception. */
export const EXCEPTION_TAG = 'exception';

/** Path of the root node. */
export const ROOT_NODE_PATH = '/';

export function createUseEnvelope(nodePath: string): XmlElement {
  return element('use', { node: nodePath });
}

export function createExecuteEnvelope(command: string): XmlElement {
  return element('execute', {}, command);
}

export function createMemberEnvelope(): XmlElement {
  return element('member');
}

export function createListEnvelope(recursive: boolean): XmlElement {
  return element('list', { r: recursive ? 'true' : 'false' });
}

export function stampToken(envelope: XmlElement, token: number): XmlElement {
  return withAttribute(envelope, TOKEN_ATTRIBUTE, String(token));
}

/**
 * Reads the request token of a reply. A missing or malformed token reads as
 * the notification token.
 */
export function readToken(reply: XmlElement): number {
  const raw = getAttribute(reply, TOKEN_ATTRIBUTE);
  if (raw === undefined || !/^\s*\d+\s*$/.test(raw)) {
    return NOTIFICATION_TOKEN;
  }
  const token = Number.parseInt(raw, 10);
  return token <= MAX_TOKEN ? token : NOTIFICATION_TOKEN;
}

export function isExceptionReply(reply: XmlElement): boolean {
  return reply.name === EXCEPTION_TAG;
}

export function remoteFaultFromReply(reply: XmlElement): RemoteFault {
  const stackTrace = childElements(reply, 'stackTrace')[0];
  return new RemoteFault(
    getAttribute(reply, 'message') ?? 'No message',
    getAttribute(reply, 'type') ?? 'Exception',
    stackTrace ? textContent(stackTrace) : undefined,
  );
}

/**
 * Node path reported by a `use` reply, root when absent.
 */
export function usePathFromReply(reply: XmlElement): string {
  return getAttribute(reply, 'node') ?? ROOT_NODE_PATH;
}
