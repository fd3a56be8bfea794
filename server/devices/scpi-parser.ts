/**
 * SCPI Response Parser
 *
 * Utilities for parsing responses on a line-oriented SCPI session.
 * Siglent instruments echo the command header in front of the value and append
 * a unit suffix ("TDIV 1.00E-03S", "C1:VDIV 5.00E-01V"); both are stripped here.
 */

import { Result, Ok, Err } from '../../shared/types.js';

const BLOCK_MARKER = 0x23; // '#'

export const ScpiParser = {
  /**
   * Parse a numeric SCPI response, with or without header and unit.
   *
   * @returns Result with parsed number, or error string describing the issue
   */
  parseNumber(response: string): Result<number, string> {
    const trimmed = response.trim();

    if (trimmed === '') {
      return Err('empty response');
    }

    // Header is everything up to the last space: "C1:OFST -2.00E-01V" -> "-2.00E-01V"
    const lastSpace = trimmed.lastIndexOf(' ');
    const valueField = lastSpace === -1 ? trimmed : trimmed.slice(lastSpace + 1);

    // parseFloat stops at the unit suffix
    const value = parseFloat(valueField);

    if (!Number.isFinite(value)) {
      return Err(`non-numeric response: "${trimmed}"`);
    }

    return Ok(value);
  },

  /**
   * Locate an IEEE 488.2 definite length block inside a response.
   *
   * Format: [header]#NXXXXXXXX...data...
   * - # is the block marker (anything before it is the echoed command header)
   * - N is a single digit indicating how many digits follow for the length
   * - XXXXXXXX is the data length in bytes (N digits)
   *
   * @returns Result with the data bounds, or an error; 'incomplete' when more bytes are needed
   */
  locateDefiniteLengthBlock(buffer: Buffer): Result<{ start: number; end: number }, string> {
    const marker = buffer.indexOf(BLOCK_MARKER);
    if (marker === -1) {
      return Err('incomplete');
    }

    if (buffer.length < marker + 2) {
      return Err('incomplete');
    }

    const numDigitsChar = String.fromCharCode(buffer[marker + 1]);
    const numDigits = parseInt(numDigitsChar, 10);

    if (isNaN(numDigits) || numDigits < 1 || numDigits > 9) {
      return Err(`invalid digit count: "${numDigitsChar}"`);
    }

    if (buffer.length < marker + 2 + numDigits) {
      return Err('incomplete');
    }

    const lengthStr = buffer.subarray(marker + 2, marker + 2 + numDigits).toString('ascii');
    const dataLength = parseInt(lengthStr, 10);

    if (isNaN(dataLength)) {
      return Err(`invalid length field: "${lengthStr}"`);
    }

    const start = marker + 2 + numDigits;
    return Ok({ start, end: start + dataLength });
  },

  /**
   * Extract the data of a definite length block (header before '#' allowed).
   */
  parseDefiniteLengthBlock(buffer: Buffer): Result<Buffer, string> {
    const located = this.locateDefiniteLengthBlock(buffer);
    if (!located.ok) {
      return located.error === 'incomplete'
        ? Err('missing # header marker or length field')
        : located;
    }

    const { start, end } = located.value;
    if (buffer.length < end) {
      return Err(`buffer too short: expected ${end - start} bytes, got ${buffer.length - start}`);
    }

    return Ok(buffer.subarray(start, end));
  },
};
