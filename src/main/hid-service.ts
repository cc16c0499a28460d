// SPDX-License-Identifier: GPL-2.0-or-later
// node-hid based HID transport.
// Handles device enumeration, open/close and raw output report writes.

import HID from 'node-hid'
import type { HIDAsync } from 'node-hid'
import { ReportError, toError } from '../shared/errors'
import type { DeviceInfo } from '../shared/types/protocol'
import { formatDeviceId, type HidTransport } from './hid-transport'

/**
 * List HID devices matching vendorId/productId.
 * Entries without a device path cannot be opened and are skipped.
 */
export async function listDevices(vendorId: number, productId: number): Promise<DeviceInfo[]> {
  const devices = await HID.devicesAsync(vendorId, productId)
  const result: DeviceInfo[] = []

  for (const d of devices) {
    if (d.vendorId !== vendorId || d.productId !== productId || !d.path) continue
    result.push({
      vendorId: d.vendorId,
      productId: d.productId,
      productName: d.product ?? '',
      serialNumber: d.serialNumber ?? '',
      path: d.path,
    })
  }

  return result
}

/**
 * Open the first device matching vendorId/productId by its path.
 */
async function openDevice(vendorId: number, productId: number): Promise<HIDAsync> {
  const id = formatDeviceId({ vendorId, productId })
  const [first] = await listDevices(vendorId, productId)
  if (!first) {
    throw new ReportError('DEVICE_NOT_FOUND', `No HID device found for ${id}`)
  }
  try {
    return await HID.HIDAsync.open(first.path)
  } catch (err) {
    throw new ReportError('DEVICE_NOT_FOUND', `Cannot open HID device ${id}: ${toError(err).message}`, err)
  }
}

/**
 * Write the report verbatim: the first report byte doubles as the
 * HID report number, as the firmware expects.
 */
async function writeReport(device: HIDAsync, data: Uint8Array): Promise<number> {
  try {
    return await device.write(Array.from(data))
  } catch (err) {
    throw new ReportError('IO_ERROR', `HID write failed: ${toError(err).message}`, err)
  }
}

async function closeDevice(device: HIDAsync): Promise<void> {
  try {
    await device.close()
  } catch (err) {
    throw new ReportError('IO_ERROR', `HID close failed: ${toError(err).message}`, err)
  }
}

export const nodeHidTransport: HidTransport<HIDAsync> = {
  open: openDevice,
  write: writeReport,
  close: closeDevice,
}
