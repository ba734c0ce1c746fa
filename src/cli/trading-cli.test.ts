import { describe, it, expect } from 'vitest';
import { formatOrder, program, toOrderInput, toOrderRef, type SubmitOptions } from './trading-cli.js';

const base: SubmitOptions = {
  venue: 'okx',
  symbol: 'BTC-USDT-SWAP',
  side: 'buy',
  kind: 'limit',
  quantity: '0.5',
  price: '42000',
  operator: 'cli',
};

describe('trading CLI', () => {
  it('should register the operator commands', () => {
    expect(program.commands.map(command => command.name())).toEqual([
      'health',
      'submit',
      'orders',
      'order',
      'cancel',
      'close',
      'strategies',
    ]);
  });

  it('should build an order input from submit options', () => {
    expect(toOrderInput({ ...base, stopLoss: '41000', key: 'retry-me' })).toEqual({
      venueId: 'okx',
      symbol: 'BTC-USDT-SWAP',
      side: 'BUY',
      kind: 'LIMIT',
      quantity: 0.5,
      price: 42000,
      stopLoss: 41000,
      takeProfit: undefined,
      referencePrice: undefined,
      idempotencyKey: 'retry-me',
      originator: { type: 'MANUAL', id: 'cli' },
    });
  });

  it('should reject an unknown side', () => {
    expect(() => toOrderInput({ ...base, side: 'hold' })).toThrow('--side must be BUY or SELL. Got: hold');
  });

  it('should reject a quantity that is not a number', () => {
    expect(() => toOrderInput({ ...base, quantity: 'lots' })).toThrow('--quantity must be a number. Got: lots');
  });

  it('should build an order reference from either id', () => {
    expect(toOrderRef({ venue: 'mt5', symbol: 'XAUUSD', clientId: 'key-1' })).toEqual({
      symbol: 'XAUUSD',
      venueOrderId: undefined,
      clientOrderId: 'key-1',
    });
  });

  it('should require an order id or client id', () => {
    expect(() => toOrderRef({ venue: 'mt5', symbol: 'XAUUSD' })).toThrow('--order-id or --client-id is required');
  });

  it('should format a partially filled order', () => {
    expect(
      formatOrder({
        symbol: 'XAUUSD',
        venueOrderId: '5001',
        clientOrderId: 'key-1',
        side: 'SELL',
        status: 'PARTIALLY_FILLED',
        quantity: 0.3,
        filledQuantity: 0.2,
        averagePrice: 2100,
      })
    ).toBe('5001 (key-1) SELL 0.2/0.3 XAUUSD PARTIALLY_FILLED @ 2100');
  });
});
