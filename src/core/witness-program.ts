/**
 * Segwit witness programs (BIP141)
 */

import { Buffer } from 'node:buffer';

import * as bitcoin from 'bitcoinjs-lib';

import { WitnessProgramError } from '../errors/index.ts';

export const MIN_PROGRAM_LENGTH = 2;
export const MAX_PROGRAM_LENGTH = 40;
export const MAX_WITNESS_VERSION = 16;

export class WitnessProgram {
  public readonly version: number;
  public readonly program: Buffer;

  /**
   * @param bytes - `version ∥ declared program length ∥ program`
   */
  constructor(bytes: Buffer) {
    if (bytes.length < 2) {
      throw new WitnessProgramError(
        'InvalidProgramLength',
        `Invalid program length ${Math.max(bytes.length - 2, 0)}`,
        { found: String(bytes.length) },
      );
    }

    const declared = bytes[1];
    const program = bytes.subarray(2);
    if (declared !== program.length) {
      throw new WitnessProgramError(
        'MismatchedProgramLength',
        `Invalid program length: expected ${declared}, found ${program.length}`,
        { expected: String(declared), found: String(program.length) },
      );
    }

    this.version = bytes[0];
    this.program = Buffer.from(program);
    WitnessProgram.validate(this.version, this.program);
  }

  static fromParts(version: number, program: Buffer): WitnessProgram {
    return new WitnessProgram(Buffer.concat([Buffer.from([version, program.length]), program]));
  }

  /**
   * Recover the program from a `OP_n <push>` scriptPubKey
   */
  static fromScriptPubKey(script: Buffer): WitnessProgram {
    const opcode = script[0];
    if (script.length < 2 || (opcode !== bitcoin.opcodes.OP_0 && (opcode < bitcoin.opcodes.OP_1 || opcode > bitcoin.opcodes.OP_16))) {
      throw new WitnessProgramError('InvalidVersion', 'Script does not start with a witness version opcode');
    }
    const version = opcode === bitcoin.opcodes.OP_0 ? 0 : opcode - (bitcoin.opcodes.OP_1 - 1);
    return new WitnessProgram(Buffer.concat([Buffer.from([version]), script.subarray(1)]));
  }

  private static validate(version: number, program: Buffer): void {
    if (program.length < MIN_PROGRAM_LENGTH || program.length > MAX_PROGRAM_LENGTH) {
      throw new WitnessProgramError('InvalidProgramLength', `Invalid program length ${program.length}`, {
        found: String(program.length),
      });
    }
    if (version > MAX_WITNESS_VERSION) {
      throw new WitnessProgramError('InvalidVersion', `Invalid version ${version}`, {
        found: String(version),
      });
    }
    if (version === 0 && program.length !== 20 && program.length !== 32) {
      throw new WitnessProgramError(
        'InvalidProgramLengthForVersion',
        `Invalid program length ${program.length} for script version ${version}`,
        { expected: '20 or 32', found: String(program.length) },
      );
    }
  }

  /** `OP_0` for version 0, `OP_1`..`OP_16` otherwise, then the program push */
  toScriptPubKey(): Buffer {
    const versionOpcode = this.version === 0 ? bitcoin.opcodes.OP_0 : bitcoin.opcodes.OP_1 - 1 + this.version;
    return Buffer.concat([Buffer.from([versionOpcode, this.program.length]), this.program]);
  }

  toBytes(): Buffer {
    return Buffer.concat([Buffer.from([this.version, this.program.length]), this.program]);
  }

  equals(other: WitnessProgram): boolean {
    return this.version === other.version && this.program.equals(other.program);
  }
}
