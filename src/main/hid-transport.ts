// SPDX-License-Identifier: GPL-2.0-or-later
// Narrow HID transport contract the send loop depends on.

/**
 * Low-level device primitives. Implementations raise ReportError with
 * DEVICE_NOT_FOUND from open and IO_ERROR from write/close.
 */
export interface HidTransport<H> {
  open(vendorId: number, productId: number): Promise<H>
  write(handle: H, data: Uint8Array): Promise<number>
  close(handle: H): Promise<void>
}

export interface DeviceIdentity {
  vendorId: number
  productId: number
}

export function formatDeviceId({ vendorId, productId }: DeviceIdentity): string {
  const hex = (v: number): string => `0x${v.toString(16).padStart(4, '0')}`
  return `${hex(vendorId)}:${hex(productId)}`
}
