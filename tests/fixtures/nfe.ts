import { NFE_NAMESPACE } from '@fiscal-intake/types';

export const IMPORTER_TAX_ID = '11111111000111';
export const DISTRIBUTOR_TAX_ID = '22222222000122';
export const CUSTOMER_TAX_ID = '33333333000133';

export const ENTITIES = { importer: IMPORTER_TAX_ID, distributor: DISTRIBUTOR_TAX_ID };

export interface NfeItem {
  vII?: string;
  afrmm?: string[];
}

export interface NfeFixture {
  number?: string;
  issuedAt?: string;
  dateTag?: 'dhEmi' | 'dEmi';
  nature?: string;
  emitterTaxId?: string;
  emitterName?: string;
  recipientTaxId?: string;
  recipientName?: string;
  totals?: Record<string, string>;
  items?: NfeItem[];
  additionalInfo?: string;
  /** Wrap NFe in nfeProc (the authorized-document envelope). */
  wrapInProc?: boolean;
  /** null drops the xmlns declaration. */
  namespace?: string | null;
  /** Writes every element with this namespace prefix, e.g. `nfe:NFe`. */
  prefix?: string;
  omit?: Array<'ide' | 'emit' | 'dest' | 'total'>;
}

const DEFAULT_TOTALS: Record<string, string> = {
  vProd: '1000.00',
  vNF: '1100.00',
  vICMS: '180.00',
  vIPI: '50.00',
  vPIS: '16.50',
  vCOFINS: '76.00',
};

function tags(values: Record<string, string>): string {
  return Object.entries(values)
    .map(([name, value]) => `<${name}>${value}</${name}>`)
    .join('');
}

function item(entry: NfeItem, index: number): string {
  const declarations = (entry.afrmm ?? []).map((value) => `<DI><nDI>DI${index}</nDI><vAFRMM>${value}</vAFRMM></DI>`).join('');
  const duty = entry.vII === undefined ? '' : `<II><vBC>0.00</vBC><vII>${entry.vII}</vII></II>`;
  return `<det nItem="${index + 1}"><prod><xProd>Item ${index + 1}</xProd>${declarations}</prod><imposto>${duty}</imposto></det>`;
}

/** Builds a minimal NF-e document; every part can be overridden or dropped. */
export function buildNfeXml(fixture: NfeFixture = {}): string {
  const omit = new Set(fixture.omit ?? []);
  const namespace = fixture.namespace === undefined ? NFE_NAMESPACE : fixture.namespace;
  const declaration = fixture.prefix === undefined ? 'xmlns' : `xmlns:${fixture.prefix}`;
  const xmlns = namespace === null ? '' : ` ${declaration}="${namespace}"`;
  const dateTag = fixture.dateTag ?? 'dhEmi';

  const ide = `<ide><natOp>${fixture.nature ?? 'VENDA DE MERCADORIA'}</natOp><nNF>${fixture.number ?? '1001'}</nNF><${dateTag}>${fixture.issuedAt ?? '2024-03-15T10:30:00-03:00'}</${dateTag}></ide>`;
  const emit = `<emit><CNPJ>${fixture.emitterTaxId ?? DISTRIBUTOR_TAX_ID}</CNPJ><xNome>${fixture.emitterName ?? 'Distribuidora Teste'}</xNome></emit>`;
  const dest = `<dest><CNPJ>${fixture.recipientTaxId ?? CUSTOMER_TAX_ID}</CNPJ><xNome>${fixture.recipientName ?? 'Cliente Teste'}</xNome></dest>`;
  const total = `<total><ICMSTot>${tags({ ...DEFAULT_TOTALS, ...fixture.totals })}</ICMSTot></total>`;
  const items = (fixture.items ?? [{}]).map(item).join('');
  const infAdic = fixture.additionalInfo === undefined ? '' : `<infAdic><infCpl>${fixture.additionalInfo}</infCpl></infAdic>`;

  const body = [
    omit.has('ide') ? '' : ide,
    omit.has('emit') ? '' : emit,
    omit.has('dest') ? '' : dest,
    items,
    omit.has('total') ? '' : total,
    infAdic,
  ].join('');

  const nfe = `<NFe${xmlns}><infNFe Id="NFe35240300000000000000550010000010011000000001" versao="4.00">${body}</infNFe></NFe>`;
  const document = fixture.wrapInProc === false ? nfe : `<nfeProc${xmlns} versao="4.00">${nfe}<protNFe versao="4.00"/></nfeProc>`;
  const written = fixture.prefix === undefined ? document : document.replace(/<(\/?)(?=[A-Za-z])/g, `<$1${fixture.prefix}:`);
  return `<?xml version="1.0" encoding="UTF-8"?>\n${written}`;
}
