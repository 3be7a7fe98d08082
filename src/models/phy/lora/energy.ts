/**
 * @module phy/lora/energy
 * @description Transmission energy
 *
 * All energies are in millijoules (mW x s).
 */

import { dbmToMilliwatts, mwhToMj } from '../../utils/conversion';

/**
 * Radio energy of one transmission: 10^(TP/10) * ToA
 */
export function energyConsumed(txPowerDbm: number, timeOnAirS: number): number {
    return dbmToMilliwatts(txPowerDbm) * timeOnAirS;
}

/**
 * Energy of a full active cycle around a transmission
 */
export interface EnergyProfile {
    /** MCU power drawn while the radio transmits (mW) */
    mcuPowerMw: number;
    /** Wake-up energy (mJ) */
    wakeUpMj: number;
    /** Processing energy (mJ) */
    processingMj: number;
    /** Receive windows after the uplink (mJ) */
    receiveWindowMj: number;
}

/** Radio energy only */
export const RADIO_ONLY_PROFILE: EnergyProfile = {
    mcuPowerMw: 0,
    wakeUpMj: 0,
    processingMj: 0,
    receiveWindowMj: 0,
};

/**
 * Class-A end device cycle: 29.7 mW MCU draw during airtime plus
 * wake-up 0.0561 mWh, processing 0.0858 mWh, receive windows 0.066 mWh.
 */
export const ACTIVE_CYCLE_PROFILE: EnergyProfile = {
    mcuPowerMw: 29.7,
    wakeUpMj: mwhToMj(0.0561),
    processingMj: mwhToMj(0.0858),
    receiveWindowMj: mwhToMj(0.066),
};

/**
 * Energy of one transmission under `profile`
 */
export function transmissionEnergy(
    txPowerDbm: number,
    timeOnAirS: number,
    profile: EnergyProfile = RADIO_ONLY_PROFILE
): number {
    const airtimeEnergy = (profile.mcuPowerMw + dbmToMilliwatts(txPowerDbm)) * timeOnAirS;
    return profile.wakeUpMj + profile.processingMj + airtimeEnergy + profile.receiveWindowMj;
}
