import { describe, it, expect } from 'vitest';
import {
  ChecksumMismatchError,
  ConnectionClosedError,
  MalformedPacketError,
  RetryExhaustedError,
  TransportError,
} from '@rsp-stub/shared';
import { PacketCodec } from '../src/rsp/packet-codec.ts';
import { ScriptedTransport } from './helpers/scripted-transport.ts';

describe('PacketCodec.send', () => {
  it('transmits the frame once when acknowledged', async () => {
    const transport = new ScriptedTransport('+');
    const codec = new PacketCodec(transport);

    await expect(codec.send('OK')).resolves.toBe(1);
    expect(transport.written).toBe('$OK#9a');
  });

  it('retransmits the identical frame after each negative acknowledgment', async () => {
    const transport = new ScriptedTransport('---+');
    const codec = new PacketCodec(transport);

    await expect(codec.send('S05')).resolves.toBe(4);
    expect(transport.writes.map((w) => w.toString('latin1'))).toEqual([
      '$S05#b8',
      '$S05#b8',
      '$S05#b8',
      '$S05#b8',
    ]);
  });

  it('treats any byte other than + as a negative acknowledgment', async () => {
    const transport = new ScriptedTransport('x$+');
    const codec = new PacketCodec(transport);

    await expect(codec.send('g')).resolves.toBe(3);
  });

  it('gives up after maxAttempts transmissions', async () => {
    const transport = new ScriptedTransport('---+');
    const codec = new PacketCodec(transport, { retry: { maxAttempts: 2, ackTimeoutMs: null } });

    const err = await codec.send('g').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetryExhaustedError);
    expect(err).toBeInstanceOf(TransportError);
    expect(transport.writes).toHaveLength(2);
    expect(transport.remaining).toBe('-+');
  });

  it('counts a failed acknowledgment read as a negative acknowledgment', async () => {
    const transport = new ScriptedTransport('');
    const codec = new PacketCodec(transport, { retry: { maxAttempts: 3, ackTimeoutMs: null } });

    await expect(codec.send('g')).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(transport.writes).toHaveLength(3);
  });

  it('passes the acknowledgment timeout to the transport', async () => {
    const transport = new ScriptedTransport('+');
    const codec = new PacketCodec(transport, { retry: { maxAttempts: null, ackTimeoutMs: 250 } });

    await codec.send('g');
    expect(transport.readOptions).toEqual([{ timeoutMs: 250 }]);
  });

  it('aborts without retrying on a short write', async () => {
    const transport = new ScriptedTransport('+');
    transport.shortWriteBy = 1;
    const codec = new PacketCodec(transport);

    await expect(codec.send('g')).rejects.toThrow('Short write: sent 4 of 5 bytes');
    expect(transport.writes).toHaveLength(1);
    expect(transport.remaining).toBe('+');
  });
});

describe('PacketCodec.receive', () => {
  it('returns the payload and acknowledges it', async () => {
    const transport = new ScriptedTransport('$m1000,4#8e');
    const codec = new PacketCodec(transport);

    const payload = await codec.receive();
    expect(payload.toString('latin1')).toBe('m1000,4');
    expect(transport.written).toBe('+');
  });

  it('parses what frame produced', async () => {
    const transport = new ScriptedTransport('$#00$vCont:1#75');
    const codec = new PacketCodec(transport);

    expect((await codec.receive()).toString('latin1')).toBe('');
    expect((await codec.receive()).toString('latin1')).toBe('vCont:1');
    expect(transport.written).toBe('++');
  });

  it('naks a checksum mismatch', async () => {
    const transport = new ScriptedTransport('$g#68');
    const codec = new PacketCodec(transport);

    const err = await codec.receive().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ChecksumMismatchError);
    if (err instanceof ChecksumMismatchError) {
      expect(err.expected).toBe(0x67);
      expect(err.received).toBe('68');
    }
    expect(transport.written).toBe('-');
  });

  it('naks a frame that does not start with $', async () => {
    const transport = new ScriptedTransport('+$g#67');
    const codec = new PacketCodec(transport);

    await expect(codec.receive()).rejects.toBeInstanceOf(MalformedPacketError);
    expect(transport.written).toBe('-');
    expect(transport.remaining).toBe('');
  });

  it('naks a packet that fills the buffer before # and drops the rest of it', async () => {
    const transport = new ScriptedTransport('$aaaaaaaa#00$?#3f');
    const codec = new PacketCodec(transport);

    await expect(codec.receive(6)).rejects.toThrow('Packet exceeds 6 bytes without a terminator');
    expect(transport.written).toBe('-');
    expect(transport.remaining).toBe('$?#3f');
  });

  it('answers an oversized packet with a single nak', async () => {
    const transport = new ScriptedTransport('$aaaaaaaa#00$?#3f');
    const codec = new PacketCodec(transport);

    expect((await codec.receivePayload(6)).toString('latin1')).toBe('?');
    expect(transport.written).toBe('-+');
  });

  it('always reads the two checksum bytes after #', async () => {
    const transport = new ScriptedTransport('$g#6');
    const codec = new PacketCodec(transport);

    await expect(codec.receive()).rejects.toBeInstanceOf(ConnectionClosedError);
    expect(transport.written).toBe('');
  });
});

describe('PacketCodec.receivePayload', () => {
  it('skips rejected frames until a valid one arrives', async () => {
    const transport = new ScriptedTransport('$g#00$?#3f');
    const codec = new PacketCodec(transport);

    const payload = await codec.receivePayload();
    expect(payload.toString('latin1')).toBe('?');
    expect(transport.written).toBe('-+');
  });

  it('lets transport failures through', async () => {
    const codec = new PacketCodec(new ScriptedTransport('$g#00'));
    await expect(codec.receivePayload()).rejects.toBeInstanceOf(ConnectionClosedError);
  });
});

describe('PacketCodec.waitForAck', () => {
  it('consumes bytes up to and including +', async () => {
    const transport = new ScriptedTransport('--+$g#67');
    await new PacketCodec(transport).waitForAck();
    expect(transport.remaining).toBe('$g#67');
  });
});
