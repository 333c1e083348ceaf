/**
 * Oracle role and emergency override
 */

import { ConfigurationError, ModeError, OracleMode } from '../types';

export interface ModeTransition {
  previous: OracleMode;
  next: OracleMode;
  changed: boolean;
}

export function parseOracleMode(value: string | number): OracleMode {
  switch (String(value).toLowerCase()) {
    case '1':
    case 'producer':
    case 'primary':
      return OracleMode.Producer;
    case '2':
    case 'consumer':
    case 'secondary':
      return OracleMode.Consumer;
    default:
      throw new ModeError(`Unknown oracle mode: ${value}`);
  }
}

export class OracleModeMachine {
  private mode: OracleMode = OracleMode.Uninitialized;
  private emergency = false;
  private emergencyPrice18 = 0n;

  getMode(): OracleMode {
    return this.mode;
  }

  /**
   * Uninitialized can only be left, never re-entered
   */
  setMode(next: OracleMode): ModeTransition {
    if (next !== OracleMode.Producer && next !== OracleMode.Consumer) {
      throw new ModeError(`Cannot switch to mode ${OracleMode[next] ?? next}`);
    }
    const previous = this.mode;
    this.mode = next;
    return { previous, next, changed: previous !== next };
  }

  /**
   * Producers always aggregate; consumers only under the emergency override
   */
  canUpdate(): boolean {
    return this.mode === OracleMode.Producer || (this.mode === OracleMode.Consumer && this.emergency);
  }

  assertCanUpdate(): void {
    if (this.mode === OracleMode.Uninitialized) {
      throw new ModeError('Oracle mode not set');
    }
    if (!this.canUpdate()) {
      throw new ModeError('Consumer oracles only ingest peer prices');
    }
  }

  activateEmergency(price18: bigint): void {
    if (price18 <= 0n) {
      throw new ConfigurationError('Emergency price must be positive');
    }
    this.emergency = true;
    this.emergencyPrice18 = price18;
  }

  deactivateEmergency(): void {
    this.emergency = false;
    this.emergencyPrice18 = 0n;
  }

  isEmergency(): boolean {
    return this.emergency;
  }

  getEmergencyPrice(): bigint {
    return this.emergencyPrice18;
  }
}
