/** Detected HID device info */
export interface DeviceInfo {
  vendorId: number
  productId: number
  productName: string
  serialNumber: string
  path: string
}

/** Operating mode bit flags (report byte 0x00) */
export enum OperatingMode {
  Ds4Compatibility = 1 << 0,
  Ds5Mode = 1 << 1,
}

/** Physical effect control bit flags (report byte 0x01) */
export enum PhysicalEffectControl {
  EnableHaptics = (1 << 0) | (1 << 1),
  TriggerEffectsRight = 1 << 2,
  TriggerEffectsLeft = 1 << 3,
}

/** Light effect control bit flags (report byte 0x02) */
export enum LightEffectControl {
  MicMuteLedControl = 1 << 0,
  PowerSaveControl = 1 << 1,
  LightbarControl = 1 << 2,
  ReleaseLeds = 1 << 3,
  PlayerIndicatorControl = 1 << 4,
}

export enum LightbarControl {
  LightbarControlEnable = 1 << 2,
}

export enum PowerSaveControl {
  MicMute = 1 << 4,
}

/** Player indicator LEDs, left to right: OUTER INNER CENTER INNER OUTER */
export enum PlayerLed {
  Center = 1 << 2,
  Inner = (1 << 1) | (1 << 3),
  Outer = (1 << 0) | (1 << 4),
}

/** Mute button LED mode. Plain enumeration, not a bitmask. */
export enum MuteButtonMode {
  Off = 0,
  On = 1,
  Pulse = 2,
}

/** Lightbar setup mode. Plain enumeration, not a bitmask. */
export enum LightbarSetup {
  LightOn = 1,
  LightOut = 2,
}

/** Successful send outcome */
export interface SendSuccess {
  bytesWritten: number
  attempts: number
}
