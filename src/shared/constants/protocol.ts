// SPDX-License-Identifier: GPL-2.0-or-later

// Reference device identity (USB)
export const DEFAULT_VENDOR_ID = 0x054c
export const DEFAULT_PRODUCT_ID = 0x0ce6

// Output report geometry
export const OUTPUT_REPORT_LEN = 64
export const TRIGGER_EFFECT_LEN = 11
export const TRIGGER_EFFECT_BODY_LEN = TRIGGER_EFFECT_LEN - 1
export const RESERVED_A_LEN = 4
export const RESERVED_B_LEN = 8

// Communication parameters
export const SEND_ATTEMPTS = 3
export const SEND_ATTEMPTS_MAX = 10
export const SEND_RETRY_DELAY_MS = 0
export const SEND_RETRY_DELAY_MAX_MS = 5000

// --- Trigger effect type tags ---
export const TRIGGER_TAG_NONE = 0x00
export const TRIGGER_TAG_CONTINUOUS_RESISTANCE = 0x01
export const TRIGGER_TAG_SECTION_RESISTANCE = 0x02
export const TRIGGER_TAG_VIBRATING = 0x06
export const TRIGGER_TAG_EFFECT_EXTENDED = 0x23
export const TRIGGER_TAG_CALIBRATE = 0xfc

// --- EffectExtended body constants ---
export const EXTENDED_KEEP_EFFECT = 0x02
export const EXTENDED_MIN_FREQUENCY = 1
