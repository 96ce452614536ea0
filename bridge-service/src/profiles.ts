import { UnsupportedModelError } from './errors.js';

export type MotionCode = 'ProfileAlarmTransmit' | 'VideoMotion';

/** Capabilities derived once from the device type. */
export interface DeviceProfile {
  readonly model: string;
  readonly isDoorbell: boolean;
  readonly supportsHuman: boolean;
  readonly motionCode: MotionCode;
  /** false when the model is not in the table and runs with the generic profile */
  readonly supported: boolean;
}

type ProfileTraits = Omit<DeviceProfile, 'model' | 'supported'>;

// AD110 firmware reports motion through its alarm profile; every other known
// family uses the standard video-motion code.
const PROFILES: Readonly<Record<string, ProfileTraits>> = {
  AD110: { isDoorbell: true, supportsHuman: false, motionCode: 'ProfileAlarmTransmit' },
  AD410: { isDoorbell: true, supportsHuman: true, motionCode: 'VideoMotion' },
};

const GENERIC_CAMERA: ProfileTraits = { isDoorbell: false, supportsHuman: false, motionCode: 'VideoMotion' };

export const SUPPORTED_MODELS: readonly string[] = Object.keys(PROFILES);

/**
 * Look up the profile for a device type. Unknown types throw
 * UnsupportedModelError unless `allowUnsupported` is set, in which case the
 * generic camera profile is returned with `supported: false`.
 */
export function resolveProfile(deviceType: string, allowUnsupported = false): DeviceProfile {
  const traits = PROFILES[deviceType];
  if (traits) return { model: deviceType, supported: true, ...traits };
  if (!allowUnsupported) throw new UnsupportedModelError(deviceType);
  return { model: deviceType, supported: false, ...GENERIC_CAMERA };
}
