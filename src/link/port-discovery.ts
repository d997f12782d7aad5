/**
 * @fileoverview Serial port discovery: ranks the ports the OS reports by how likely they
 * are to be a USB-serial display controller.
 */

import { SerialPort } from 'serialport';

export interface PortCandidate {
  path: string;
  manufacturer: string;
  vendorId: string;
  productId: string;
  likelyDevice: boolean;
}

/** Shape of the records returned by `SerialPort.list()` that discovery relies on. */
export interface PortRecord {
  path: string;
  manufacturer?: string | undefined;
  vendorId?: string | undefined;
  productId?: string | undefined;
}

export type PortLister = () => Promise<PortRecord[]>;

/** Espressif native USB, Silicon Labs CP210x, WCH CH340/CH341, FTDI. */
const KNOWN_VENDOR_IDS = new Set(['303a', '10c4', '1a86', '0403']);
const KNOWN_MANUFACTURERS = ['espressif', 'silicon labs', 'wch', 'qinheng', 'ftdi'];

export function isLikelyDevice(port: PortRecord): boolean {
  const vendor = (port.vendorId ?? '').toLowerCase();
  const manufacturer = (port.manufacturer ?? '').toLowerCase();
  return (
    KNOWN_VENDOR_IDS.has(vendor) || KNOWN_MANUFACTURERS.some((name) => manufacturer.includes(name))
  );
}

/**
 * Likely devices first, then the rest, each group in path order.
 */
export function rankPorts(ports: PortRecord[]): PortCandidate[] {
  return ports
    .map((port) => ({
      path: port.path,
      manufacturer: port.manufacturer ?? 'Unknown',
      vendorId: port.vendorId ?? '',
      productId: port.productId ?? '',
      likelyDevice: isLikelyDevice(port),
    }))
    .sort((a, b) => {
      if (a.likelyDevice !== b.likelyDevice) {
        return a.likelyDevice ? -1 : 1;
      }
      return a.path.localeCompare(b.path);
    });
}

export async function listPortCandidates(
  lister: PortLister = () => SerialPort.list()
): Promise<PortCandidate[]> {
  return rankPorts(await lister());
}

/**
 * Picks the first likely device, or undefined when none is attached.
 */
export async function discoverDevicePort(
  lister: PortLister = () => SerialPort.list()
): Promise<string | undefined> {
  const candidates = await listPortCandidates(lister);
  return candidates.find((candidate) => candidate.likelyDevice)?.path;
}
