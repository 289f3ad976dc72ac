import { encode } from '@msgpack/msgpack';
import { concat, getBytes, keccak256, Signature, type Wallet } from 'ethers';
import type { ExchangeAction, ExchangeSignature } from './types.js';
import { MAX_PERP_PRICE_DECIMALS, PRICE_SIGNIFICANT_FIGURES } from '../../config/constants.js';
import { roundTo, roundToSignificant } from '../../utils/math.js';

// L1 actions are signed as a "phantom agent" under this fixed domain
const PHANTOM_DOMAIN = {
  name: 'Exchange',
  version: '1',
  chainId: 1337,
  verifyingContract: '0x0000000000000000000000000000000000000000',
};

const AGENT_TYPES = {
  Agent: [
    { name: 'source', type: 'string' },
    { name: 'connectionId', type: 'bytes32' },
  ],
};

/**
 * keccak256(msgpack(action) ++ nonce as u64 BE ++ vault marker)
 */
export function actionHash(action: ExchangeAction, vaultAddress: string | null, nonce: number): string {
  const nonceBytes = new Uint8Array(8);
  new DataView(nonceBytes.buffer).setBigUint64(0, BigInt(nonce));

  const vaultBytes =
    vaultAddress === null ? new Uint8Array([0]) : getBytes(concat([new Uint8Array([1]), getBytes(vaultAddress)]));

  return keccak256(concat([encode(action), nonceBytes, vaultBytes]));
}

/**
 * Sign an L1 action with the controller wallet
 */
export async function signL1Action(
  wallet: Wallet,
  action: ExchangeAction,
  vaultAddress: string | null,
  nonce: number,
  isMainnet: boolean
): Promise<ExchangeSignature> {
  const phantomAgent = {
    source: isMainnet ? 'a' : 'b',
    connectionId: actionHash(action, vaultAddress, nonce),
  };

  const signature = Signature.from(await wallet.signTypedData(PHANTOM_DOMAIN, AGENT_TYPES, phantomAgent));
  return { r: signature.r, s: signature.s, v: signature.v };
}

/**
 * Decimal string the exchange accepts: at most 8 decimals, no trailing zeros
 */
export function floatToWire(value: number): string {
  const rounded = value.toFixed(8);
  if (Math.abs(Number(rounded) - value) >= 1e-12) {
    throw new Error(`floatToWire causes rounding: ${value}`);
  }

  const trimmed = rounded.replace(/0+$/, '').replace(/\.$/, '');
  return trimmed === '-0' ? '0' : trimmed;
}

/**
 * Limit price for a marketable IOC order: mid moved by the slippage allowance,
 * then cut to 5 significant figures and the instrument's price decimals
 */
export function slippagePrice(mid: number, isBuy: boolean, slippagePercent: number, szDecimals: number): number {
  const factor = isBuy ? 1 + slippagePercent / 100 : 1 - slippagePercent / 100;
  const price = roundToSignificant(mid * factor, PRICE_SIGNIFICANT_FIGURES);
  return roundTo(price, Math.max(0, MAX_PERP_PRICE_DECIMALS - szDecimals));
}
