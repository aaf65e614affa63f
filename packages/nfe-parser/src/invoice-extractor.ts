import { XMLParser, XMLValidator } from 'fast-xml-parser';
import {
  InvoiceRecordSchema,
  MalformedDocumentError,
  NFE_NAMESPACE,
  UNKNOWN_REFERENCE,
  errorMessage,
  getLogger,
  normalizeDate,
  normalizeValue,
  type InvoiceRecord,
} from '@fiscal-intake/types';
import { asList, at, isXmlObject, xmlText } from './xml-tree.js';

export interface ExtractInvoiceOptions {
  referenceToken?: string | null;
  /** Reference instant used when the issue date is absent. */
  now?: Date;
}

/** Label patterns for the customs-processing fee in `infCpl`, first match wins. */
export const CUSTOMS_FEE_PATTERNS: readonly RegExp[] = [
  /SISCOMEX[:\s]+(?:FOI\s+DE\s+)?(?:R\$\s*)?(\d{1,3}(?:\.\d{3})*,\d{2})/,
  /TAXA\s+(?:DE\s+)?SISCOMEX\D{0,20}?(\d{1,3}(?:\.\d{3})*,\d{2})/,
];

const REQUIRED_GROUPS: ReadonlyArray<readonly string[]> = [['ide'], ['emit'], ['dest'], ['total', 'ICMSTot']];

const PARSER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
} as const;

/** Element names without namespace prefixes; used for field access. */
const parser = new XMLParser({ ...PARSER_OPTIONS, removeNSPrefix: true });
/** Names as written, `xmlns` declarations included; used to resolve the namespace. */
const declarationParser = new XMLParser(PARSER_OPTIONS);

export interface ParsedInvoiceTree {
  tree: unknown;
  /** Namespace the `NFe` element is bound to, '' when undeclared. */
  namespace: string;
}

function amountOf(node: unknown, ...names: string[]): number {
  const text = xmlText(at(node, ...names));
  return text === '' ? 0 : normalizeValue(text).value;
}

/** Runs a minor-field extraction; any failure yields 0. */
function failClosed(label: string, extract: () => number): number {
  try {
    return extract();
  } catch (err) {
    getLogger().warn(`Could not read ${label}, using 0: ${errorMessage(err)}`);
    return 0;
  }
}

function localName(name: string): string {
  return name.slice(name.indexOf(':') + 1);
}

function prefixOf(name: string): string {
  const colon = name.indexOf(':');
  return colon === -1 ? '' : name.slice(0, colon);
}

function childNamed(node: unknown, local: string): { name: string; value: unknown } | undefined {
  if (!isXmlObject(node)) return undefined;
  const name = Object.keys(node).find((key) => !key.startsWith('@_') && localName(key) === local);
  return name === undefined ? undefined : { name, value: node[name] };
}

/** Namespace bound to the `NFe` element, declared on it or on its `nfeProc` envelope. */
export function resolveInvoiceNamespace(tree: unknown): string {
  const proc = childNamed(tree, 'nfeProc');
  const nfe = childNamed(proc?.value, 'NFe') ?? childNamed(tree, 'NFe');
  if (nfe === undefined) return '';

  const prefix = prefixOf(nfe.name);
  const attribute = prefix === '' ? '@_xmlns' : `@_xmlns:${prefix}`;
  return xmlText(at(nfe.value, attribute)) || xmlText(at(proc?.value, attribute));
}

export function parseInvoiceTree(xml: string): ParsedInvoiceTree {
  const text = xml.replace(/^\uFEFF/, '').trim();
  if (text === '') {
    throw new MalformedDocumentError('Empty XML document');
  }

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new MalformedDocumentError(`Invalid XML at line ${line}: ${msg}`);
  }

  try {
    const tree: unknown = parser.parse(text);
    const declared: unknown = declarationParser.parse(text);
    return { tree, namespace: resolveInvoiceNamespace(declared) };
  } catch (err) {
    throw new MalformedDocumentError(`Invalid XML: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Locates `infNFe` under `nfeProc/NFe` or a bare `NFe` root, requiring the
 * `NFe` element to be in the portal namespace.
 */
export function locateInvoiceInfo({ tree, namespace }: ParsedInvoiceTree): unknown {
  const nfe = at(tree, 'nfeProc', 'NFe') ?? at(tree, 'NFe');
  if (!isXmlObject(nfe)) {
    throw new MalformedDocumentError('Missing <NFe> element');
  }

  if (namespace !== NFE_NAMESPACE) {
    throw new MalformedDocumentError(`Document is not in the ${NFE_NAMESPACE} namespace`);
  }

  const info = at(nfe, 'infNFe');
  if (!isXmlObject(info)) {
    throw new MalformedDocumentError('Missing <infNFe> element');
  }

  for (const path of REQUIRED_GROUPS) {
    if (!isXmlObject(at(info, ...path))) {
      throw new MalformedDocumentError(`Missing required group <${path.join('/')}>`);
    }
  }
  return info;
}

/** Import duty summed over items, falling back to the `ICMSTot` total. */
export function sumImportDuty(info: unknown): number {
  let found = false;
  let total = 0;
  for (const item of asList(at(info, 'det'))) {
    const duty = xmlText(at(item, 'imposto', 'II', 'vII'));
    if (duty === '') continue;
    found = true;
    total += normalizeValue(duty).value;
  }
  return found ? total : amountOf(info, 'total', 'ICMSTot', 'vII');
}

/** AFRMM summed over every import declaration of every item. */
export function sumSurcharge(info: unknown): number {
  let total = 0;
  for (const item of asList(at(info, 'det'))) {
    for (const declaration of asList(at(item, 'prod', 'DI'))) {
      total += amountOf(declaration, 'vAFRMM');
    }
  }
  return total;
}

export function scanCustomsFee(additionalInfo: string): number {
  const text = additionalInfo.toUpperCase();
  for (const pattern of CUSTOMS_FEE_PATTERNS) {
    const amount = pattern.exec(text)?.[1];
    if (amount !== undefined) {
      return normalizeValue(amount).value;
    }
  }
  return 0;
}

function taxIdOf(party: unknown): string {
  return xmlText(at(party, 'CNPJ')) || xmlText(at(party, 'CPF'));
}

/**
 * Extracts an invoice record from NF-e XML. Throws MalformedDocumentError
 * when the document cannot be read or a required group is missing; absent
 * tax components default to 0.
 */
export function extractInvoice(xml: string, options: ExtractInvoiceOptions = {}): InvoiceRecord {
  const info = locateInvoiceInfo(parseInvoiceTree(xml));
  const ide = at(info, 'ide');
  const emit = at(info, 'emit');
  const dest = at(info, 'dest');
  const totals = at(info, 'total', 'ICMSTot');

  const issuedAt = xmlText(at(ide, 'dhEmi')) || xmlText(at(ide, 'dEmi'));
  const dateOptions = options.now !== undefined ? { now: options.now } : {};

  const record = InvoiceRecordSchema.parse({
    invoiceNumber: xmlText(at(ide, 'nNF')),
    issueDate: normalizeDate(issuedAt, dateOptions).value,
    operationNature: xmlText(at(ide, 'natOp')),
    emitterTaxId: taxIdOf(emit),
    emitterName: xmlText(at(emit, 'xNome')),
    recipientTaxId: taxIdOf(dest),
    recipientName: xmlText(at(dest, 'xNome')),
    productValue: amountOf(totals, 'vProd'),
    invoiceValue: amountOf(totals, 'vNF'),
    icms: amountOf(totals, 'vICMS'),
    ipi: amountOf(totals, 'vIPI'),
    pis: amountOf(totals, 'vPIS'),
    cofins: amountOf(totals, 'vCOFINS'),
    importDuty: failClosed('import duty', () => sumImportDuty(info)),
    surcharge: failClosed('AFRMM', () => sumSurcharge(info)),
    customsFee: failClosed('SISCOMEX', () => scanCustomsFee(xmlText(at(info, 'infAdic', 'infCpl')))),
    referenceToken: options.referenceToken?.trim() || UNKNOWN_REFERENCE,
  });

  getLogger().debug(`Extracted NF ${record.invoiceNumber} (${record.operationNature})`);
  return Object.freeze(record);
}
