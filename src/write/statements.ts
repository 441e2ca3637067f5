/**
 * TurboIntegrator code and upload payloads for cell writes.
 * @module write/statements
 */

import { InvalidArgumentError } from '../errors/index.js';
import { HIERARCHY_SEPARATOR } from '../services/cells.js';
import type { ElementType } from '../services/cubes.js';
import { lowerAndDropSpaces } from '../utils/index.js';
import type { CellValue, WriteUnit } from './types.js';

/**
 * Options that shape generated statements.
 */
export interface StatementOptions {
  increment?: boolean;
  precision?: number;
  skipNonUpdateable?: boolean;
  /** Types of the elements of the cube's last dimension */
  measureTypes?: ReadonlyMap<string, ElementType>;
}

/**
 * TI string literal.
 */
export function tiString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Formats a number for TI code or upload files. Exponent notation, which TI
 * cannot parse, is never produced.
 */
export function formatNumber(value: number, precision?: number): string {
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(`Cannot write non-finite number ${value}`);
  }
  if (Math.abs(value) >= 1e21) {
    // toFixed switches to exponent notation from 1e21; such doubles are integers
    return BigInt(value).toString();
  }
  if (precision !== undefined) {
    return value.toFixed(precision);
  }
  const plain = String(value);
  if (!/e/i.test(plain)) {
    return plain;
  }
  const fixed = value.toFixed(20);
  return fixed.includes('.') ? fixed.replace(/0+$/, '').replace(/\.$/, '') : fixed;
}

/**
 * Element part of a coordinate that may carry a hierarchy prefix.
 */
export function elementName(coordinate: string): string {
  const separator = coordinate.indexOf(HIERARCHY_SEPARATOR);
  return separator === -1 ? coordinate : coordinate.slice(separator + HIERARCHY_SEPARATOR.length);
}

/**
 * Statements emitted per unit.
 */
export function statementsPerUnit(options: StatementOptions): number {
  return options.skipNonUpdateable ? 3 : 1;
}

function isStringCell(unit: WriteUnit, measureTypes?: ReadonlyMap<string, ElementType>): boolean {
  const last = unit.coordinates[unit.coordinates.length - 1];
  const type = last !== undefined ? measureTypes?.get(lowerAndDropSpaces(elementName(last))) : undefined;
  if (type !== undefined) {
    return type === 'String';
  }
  return typeof unit.value === 'string';
}

function numericValue(value: CellValue): number | undefined {
  if (typeof value === 'number') {
    return value;
  }
  if (value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * TI statement(s) writing one unit.
 */
export function cellStatements(unit: WriteUnit, options: StatementOptions = {}): string[] {
  const address = [unit.cube, ...unit.coordinates.map(elementName)].map(tiString).join(', ');
  const numeric = isStringCell(unit, options.measureTypes) ? undefined : numericValue(unit.value);

  let statement: string;
  if (numeric === undefined) {
    const text = typeof unit.value === 'number' ? formatNumber(unit.value, options.precision) : unit.value;
    statement = `CellPutS(${tiString(text)}, ${address});`;
  } else {
    const fn = options.increment ? 'CellIncrementN' : 'CellPutN';
    statement = `${fn}(${formatNumber(numeric, options.precision)}, ${address});`;
  }

  if (!options.skipNonUpdateable) {
    return [statement];
  }
  return [`If(CellIsUpdateable(${address}) = 1);`, statement, 'EndIf;'];
}

/**
 * TI statements writing all units.
 */
export function buildStatements(units: readonly WriteUnit[], options: StatementOptions = {}): string[] {
  return units.flatMap((unit) => cellStatements(unit, options));
}

/**
 * Quote and delimiter of upload files.
 */
export const UPLOAD_QUOTE = '"';
export const UPLOAD_DELIMITER = ',';

function csvField(value: string): string {
  return `${UPLOAD_QUOTE}${value.replace(/"/g, '""')}${UPLOAD_QUOTE}`;
}

/**
 * One line per unit: quoted coordinates followed by the quoted value.
 */
export function buildUploadPayload(units: readonly WriteUnit[], precision?: number): string {
  return units
    .map((unit) => {
      const value = typeof unit.value === 'number' ? formatNumber(unit.value, precision) : unit.value;
      return [...unit.coordinates.map(elementName), value].map(csvField).join(UPLOAD_DELIMITER);
    })
    .join('\r\n');
}

/**
 * Names of the process variables reading an upload file.
 */
export function uploadVariables(dimensionCount: number): string[] {
  return [...Array.from({ length: dimensionCount }, (_, i) => `v${i + 1}`), 'vValue'];
}

/**
 * Data procedure loading an upload file. The cell type is checked per row
 * on the server, so no client-side probing is needed.
 */
export function buildUploadDataProcedure(
  cube: string,
  dimensions: readonly string[],
  options: Pick<StatementOptions, 'increment' | 'skipNonUpdateable'> = {}
): string[] {
  const variables = uploadVariables(dimensions.length).slice(0, -1);
  const address = [tiString(cube), ...variables].join(', ');
  const lastDimension = dimensions[dimensions.length - 1] ?? '';
  const lastVariable = variables[variables.length - 1] ?? '';
  const numericPut = options.increment ? 'CellIncrementN' : 'CellPutN';

  const body = [
    `If(DType(${tiString(lastDimension)}, ${lastVariable}) @= 'S');`,
    `  CellPutS(vValue, ${address});`,
    'Else;',
    `  ${numericPut}(StringToNumber(vValue), ${address});`,
    'EndIf;',
  ];
  if (!options.skipNonUpdateable) {
    return body;
  }
  return [`If(CellIsUpdateable(${address}) = 1);`, ...body, 'EndIf;'];
}
