// src/parse_policies.ts
// Security-policy export -> Policy[].
//
// Policies are grouped by zone pair:
//   <security-context>
//     <context-information><source-zone-name/><destination-zone-name/></context-information>
//     <policies><policy-information>…</policy-information>…</policies>
//   </security-context>
// Address and application names are kept as names; zones resolve them.

import { MalformedDocumentError } from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import { children, descendants, parseXmlDocument, requireText } from './xml';

export type PolicyAction = 'permit' | 'deny' | 'reject';

export type Policy = {
  readonly name: string;
  readonly fromZone: string;
  readonly toZone: string;
  readonly enabled: boolean;
  /** evaluation order within the zone pair */
  readonly sequence: number;
  readonly sourceAddresses: readonly string[];
  readonly destinationAddresses: readonly string[];
  readonly applications: readonly string[];
  readonly action: PolicyAction;
};

const ACTIONS: readonly PolicyAction[] = ['permit', 'deny', 'reject'];

// ---------------- main ----------------

export function parsePolicies(xmlText: string, log: Logger = defaultLogger): Policy[] {
  return extractPolicies(parseXmlDocument(xmlText, 'policies'), log);
}

export function extractPolicies(doc: Document, log: Logger = defaultLogger): Policy[] {
  log.info('parsing policies');
  const out: Policy[] = [];
  for (const ctx of descendants(doc.documentElement, 'security-context')) {
    const fromZone = requireText(ctx, 'context-information/source-zone-name', 'policies');
    const toZone = requireText(ctx, 'context-information/destination-zone-name', 'policies');
    for (const pie of children(ctx, 'policies/policy-information')) {
      out.push(parsePolicyInformation(fromZone, toZone, pie));
    }
  }
  log.debug({ count: out.length }, 'parsed policies');
  return out;
}

// ---------------- parsers ----------------

function parsePolicyInformation(fromZone: string, toZone: string, pie: Element): Policy {
  const name = requireText(pie, 'policy-name', 'policies', null, { fromZone, toZone });
  const where = { fromZone, toZone, policy: name };

  const sequenceText = requireText(pie, 'policy-sequence-number', 'policies', null, where);
  const sequence = /^[+-]?\d+$/.test(sequenceText) ? Number(sequenceText) : NaN;
  if (Number.isNaN(sequence)) {
    throw new MalformedDocumentError('policies', `policy '${name}' has non-numeric sequence number '${sequenceText}'`, where);
  }
  if (!Number.isSafeInteger(sequence)) {
    throw new MalformedDocumentError('policies', `policy '${name}' has out-of-range sequence number '${sequenceText}'`, where);
  }

  const actionText = requireText(pie, 'policy-action/action-type', 'policies', null, where);
  const action = ACTIONS.find(a => a === actionText);
  if (!action) {
    throw new MalformedDocumentError('policies', `policy '${name}' has unknown action '${actionText}'`, where);
  }

  return Object.freeze({
    name,
    fromZone,
    toZone,
    enabled: requireText(pie, 'policy-state', 'policies', null, where) === 'enabled',
    sequence,
    sourceAddresses: Object.freeze(
      children(pie, 'source-addresses/*').map(e => requireText(e, 'address-name', 'policies', null, where)),
    ),
    destinationAddresses: Object.freeze(
      children(pie, 'destination-addresses/*').map(e => requireText(e, 'address-name', 'policies', null, where)),
    ),
    applications: Object.freeze(
      children(pie, 'applications/application').map(e => requireText(e, 'application-name', 'policies', null, where)),
    ),
    action,
  });
}
