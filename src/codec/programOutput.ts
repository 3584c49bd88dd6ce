/**
 * Starknet OS program-output codec.
 *
 * Layout, one felt per cell:
 *
 *   [bootloader header: 3]
 *   [OS header: 10]
 *   [n1] [n1 felts: messages to Starknet, each from, to, len, payload...]
 *   [n2] [n2 felts: messages to appchain, each from, to, nonce, selector, len, payload...]
 *
 * The bootloader header is skipped without being interpreted.
 */

import type { Felt } from "../types/brands";
import type {
  DecodeOptions,
  MessageToAppchain,
  MessageToStarknet,
  ProgramOutput,
} from "../core/types";
import { fail } from "../core/errors";
import { asFelt, toIndex, ZERO } from "../core/felt";
import { FeltCursor } from "./cursor";

export const BOOTLOADER_HEADER_SIZE = 3;
export const OS_HEADER_SIZE = 10;
export const MESSAGE_TO_STARKNET_HEADER_SIZE = 3;
export const MESSAGE_TO_APPCHAIN_HEADER_SIZE = 5;

export const HeaderOffset = {
  InitialRoot: 0,
  FinalRoot: 1,
  PrevBlockNumber: 2,
  NewBlockNumber: 3,
  PrevBlockHash: 4,
  NewBlockHash: 5,
  OsProgramHash: 6,
  ConfigHash: 7,
  UseKzgDa: 8,
  FullOutput: 9,
} as const;

export const DEFAULT_DECODE_OPTIONS: DecodeOptions = { truncation: "lenient" };

/* helpers */

type Batch = { felts: Felt[]; cut: boolean };

// Reads `[count, ...count felts]`. Lenient mode clamps at end-of-stream and
// marks the batch as cut; only a batch after a cut may lose its count.
const readBatch = (
  cur: FeltCursor,
  what: string,
  opts: DecodeOptions,
  afterCut: boolean,
): Batch => {
  if (cur.done) {
    if (opts.truncation === "strict" || !afterCut)
      fail("MalformedStream", `${what}: missing count`);
    return { felts: [], cut: true };
  }
  const n = cur.nextIndex(`${what} count`);
  if (opts.truncation === "strict") return { felts: cur.take(n, what), cut: false };
  const cut = n > cur.remaining;
  return { felts: cur.takeAtMost(n), cut };
};

// Splits a batch into `header ++ payload` records. The batch is self-bounded:
// an incomplete trailing record is dropped (lenient) or rejected (strict).
const splitRecords = (
  batch: readonly Felt[],
  headerSize: number,
  what: string,
  opts: DecodeOptions,
): { header: Felt[]; payload: Felt[] }[] => {
  const seg = new FeltCursor(batch);
  const out: { header: Felt[]; payload: Felt[] }[] = [];
  while (!seg.done) {
    if (seg.remaining < headerSize) {
      if (opts.truncation === "strict")
        fail("MalformedStream", `${what}: truncated header at record ${out.length}`);
      break;
    }
    const header = seg.take(headerSize, what);
    const size = toIndex(header[headerSize - 1], `${what} payload length`);
    if (seg.remaining < size) {
      if (opts.truncation === "strict")
        fail("MalformedStream", `${what}: truncated payload at record ${out.length}`);
      break;
    }
    out.push({ header, payload: seg.take(size, what) });
  }
  return out;
};

/* decode */

export const decodeProgramOutput = (
  stream: readonly Felt[],
  options: Partial<DecodeOptions> = {},
): ProgramOutput => {
  const opts: DecodeOptions = { ...DEFAULT_DECODE_OPTIONS, ...options };
  const cur = new FeltCursor(stream);

  cur.take(BOOTLOADER_HEADER_SIZE, "bootloader header");
  const h = cur.take(OS_HEADER_SIZE, "OS header");

  if (h[HeaderOffset.OsProgramHash] !== ZERO)
    fail("UnsupportedMode", "aggregator programs are not supported");
  if (h[HeaderOffset.UseKzgDa] !== ZERO)
    fail("UnsupportedMode", "KZG data availability is not supported");
  if (h[HeaderOffset.FullOutput] !== ZERO)
    fail("UnsupportedMode", "full output mode is not supported");

  const toStarknet = readBatch(cur, "messages to starknet", opts, false);
  const toAppchain = readBatch(cur, "messages to appchain", opts, toStarknet.cut);

  if (opts.truncation === "strict" && !cur.done)
    fail("MalformedStream", `${cur.remaining} trailing elements after messages`);

  const messagesToStarknet: MessageToStarknet[] = splitRecords(
    toStarknet.felts,
    MESSAGE_TO_STARKNET_HEADER_SIZE,
    "messages to starknet",
    opts,
  ).map(({ header: [fromAddress, toAddress], payload }) => ({
    fromAddress,
    toAddress,
    payload,
  }));

  const messagesToAppchain: MessageToAppchain[] = splitRecords(
    toAppchain.felts,
    MESSAGE_TO_APPCHAIN_HEADER_SIZE,
    "messages to appchain",
    opts,
  ).map(({ header: [fromAddress, toAddress, nonce, selector], payload }) => ({
    fromAddress,
    toAddress,
    nonce,
    selector,
    payload,
  }));

  return {
    initialRoot: h[HeaderOffset.InitialRoot],
    finalRoot: h[HeaderOffset.FinalRoot],
    prevBlockNumber: h[HeaderOffset.PrevBlockNumber],
    newBlockNumber: h[HeaderOffset.NewBlockNumber],
    prevBlockHash: h[HeaderOffset.PrevBlockHash],
    newBlockHash: h[HeaderOffset.NewBlockHash],
    osProgramHash: h[HeaderOffset.OsProgramHash],
    configHash: h[HeaderOffset.ConfigHash],
    useKzgDa: h[HeaderOffset.UseKzgDa],
    fullOutput: h[HeaderOffset.FullOutput],
    messagesToStarknet,
    messagesToAppchain,
  };
};

/* encode */

const len = (xs: readonly unknown[]) => asFelt(xs.length);

export const encodeMessageToStarknet = (m: MessageToStarknet): Felt[] => [
  m.fromAddress,
  m.toAddress,
  len(m.payload),
  ...m.payload,
];

export const encodeMessageToAppchain = (m: MessageToAppchain): Felt[] => [
  m.fromAddress,
  m.toAddress,
  m.nonce,
  m.selector,
  len(m.payload),
  ...m.payload,
];

export const encodeProgramOutput = (
  o: ProgramOutput,
  bootloaderHeader: readonly Felt[] = [ZERO, ZERO, ZERO],
): Felt[] => {
  if (bootloaderHeader.length !== BOOTLOADER_HEADER_SIZE)
    fail("MalformedStream", `bootloader header must be ${BOOTLOADER_HEADER_SIZE} elements`);
  const toStarknet = o.messagesToStarknet.flatMap(encodeMessageToStarknet);
  const toAppchain = o.messagesToAppchain.flatMap(encodeMessageToAppchain);
  return [
    ...bootloaderHeader,
    o.initialRoot,
    o.finalRoot,
    o.prevBlockNumber,
    o.newBlockNumber,
    o.prevBlockHash,
    o.newBlockHash,
    o.osProgramHash,
    o.configHash,
    o.useKzgDa,
    o.fullOutput,
    len(toStarknet),
    ...toStarknet,
    len(toAppchain),
    ...toAppchain,
  ];
};
