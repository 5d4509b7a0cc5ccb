import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import express from 'express';
import type { RemoteInfo } from 'node:dgram';

import { DiscoveryClient } from './discoveryClient';
import { createInMemorySsdpNetwork } from './ssdpSocketManager';
import { startLoopbackServer, type LoopbackServer } from './httpTestServer';
import { delay } from './utils';
import type { DiscoveryAdvertisement, SsdpTransport } from './types';

function descriptorXml(roomName: string): string {
    return `<?xml version="1.0"?><root xmlns="urn:schemas-upnp-org:device-1-0"><device><roomName>${roomName}</roomName></device></root>`;
}

function advertisement(location: string, headerName = 'LOCATION'): Buffer {
    return Buffer.from(`HTTP/1.1 200 OK\r\nCACHE-CONTROL: max-age=1800\r\n${headerName}: ${location}\r\nST: urn:schemas-upnp-org:device:ZonePlayer:1\r\n\r\n`);
}

describe('DiscoveryClient', () => {
    let stub: LoopbackServer;
    const hits: Record<string, number> = {};

    beforeAll(async () => {
        const app = express();
        const descriptors: Record<string, string> = {
            '/kitchen.xml': descriptorXml('Kitchen'),
            '/living.xml': descriptorXml('Living Room'),
            '/living-dup.xml': descriptorXml('LivingRoom'),
            '/nameless.xml': descriptorXml(''),
        };
        app.get('/:file', (req, res) => {
            const path = `/${req.params.file}`;
            hits[path] = (hits[path] ?? 0) + 1;
            const room = /^\/room-(\d+)\.xml$/.exec(path);
            const body = room ? descriptorXml(`Room ${room[1]}`) : descriptors[path];
            if (body === undefined) {
                res.status(404).send('missing');
                return;
            }
            res.type('text/xml').send(body);
        });
        stub = await startLoopbackServer(app);
    });

    afterAll(async () => {
        await stub.close();
    });

    /** רספונדר בזיכרון שעונה לכל M-SEARCH ברשימת תגובות קבועה */
    async function startResponder(network: ReturnType<typeof createInMemorySsdpNetwork>, replies: Buffer[]) {
        const searches: string[] = [];
        let transport: SsdpTransport | undefined;
        transport = await network.factory('listen', (msg: Buffer, rinfo: RemoteInfo) => {
            searches.push(msg.toString());
            for (const reply of replies) {
                void transport?.send(reply, rinfo.port, rinfo.address);
            }
        }, () => {});
        return { searches, transport };
    }

    it('should send one M-SEARCH and fetch each duplicated location once', async () => {
        const network = createInMemorySsdpNetwork();
        const kitchen = `${stub.baseUrl}/kitchen.xml`;
        const { searches } = await startResponder(network, [advertisement(kitchen), advertisement(kitchen, 'location')]);
        hits['/kitchen.xml'] = 0;

        const client = new DiscoveryClient({ timeoutMs: 150, transportFactory: network.factory });
        const advertisements: DiscoveryAdvertisement[] = [];
        client.on('advertisement', (adv: DiscoveryAdvertisement) => advertisements.push(adv));

        const devices = await client.discover();

        expect(searches).toHaveLength(1);
        expect(searches[0]).toContain('ST: urn:schemas-upnp-org:device:ZonePlayer:1\r\n');
        expect(network.multicastCount).toBe(1);
        expect(advertisements).toHaveLength(2);
        expect(hits['/kitchen.xml']).toBe(1);
        expect([...devices.keys()]).toEqual(['kitchen']);
        expect(devices.get('kitchen')).toEqual({
            displayName: 'Kitchen',
            stableId: 'kitchen',
            controlBaseUrl: stub.baseUrl,
        });
    });

    it('should skip unreachable and nameless devices without failing the pass', async () => {
        const network = createInMemorySsdpNetwork();
        await startResponder(network, [
            advertisement(`${stub.baseUrl}/missing.xml`),
            advertisement(`${stub.baseUrl}/nameless.xml`),
            advertisement(`${stub.baseUrl}/living.xml`),
            Buffer.from('HTTP/1.1 200 OK\r\nST: upnp:rootdevice\r\n\r\n'),
        ]);

        const client = new DiscoveryClient({ timeoutMs: 150, transportFactory: network.factory });
        const found = vi.fn();
        client.on('devicefound', found);

        const devices = await client.discover();

        expect([...devices.keys()]).toEqual(['livingroom']);
        expect(found).toHaveBeenCalledTimes(1);
    });

    it('should let the last record win on a stable id collision', async () => {
        const network = createInMemorySsdpNetwork();
        await startResponder(network, [
            advertisement(`${stub.baseUrl}/living.xml`),
            advertisement(`${stub.baseUrl}/living-dup.xml`),
        ]);

        const client = new DiscoveryClient({ timeoutMs: 150, transportFactory: network.factory });
        const devices = await client.discover();

        expect(devices.size).toBe(1);
        expect(devices.get('livingroom')?.displayName).toBe('LivingRoom');
    });

    it('should stop collecting at the deadline even while responses keep arriving', async () => {
        const network = createInMemorySsdpNetwork();
        const sentAt: number[] = [];
        let timer: NodeJS.Timeout | undefined;
        const responder = await network.factory('listen', (_msg, rinfo) => {
            timer = setInterval(() => {
                const n = sentAt.length;
                sentAt.push(Date.now());
                responder.send(advertisement(`${stub.baseUrl}/room-${n}.xml`), rinfo.port, rinfo.address).catch(() => undefined);
                if (sentAt.length === 12) clearInterval(timer);
            }, 25);
        }, () => {});

        const client = new DiscoveryClient({ timeoutMs: 150, transportFactory: network.factory });
        const started = Date.now();
        try {
            const devices = await client.discover();
            const elapsed = Date.now() - started;

            // חלון של 150ms, ולא המתנה עד שהתגובות נפסקות (אחרי 300ms)
            expect(elapsed).toBeGreaterThanOrEqual(145);
            expect(elapsed).toBeLessThan(280);

            // נותנים לרספונדר לסיים לשלוח לפני שבודקים את המאוחרים
            await delay(200);

            const deadline = started + 150;
            const early = sentAt.flatMap((time, n) => (time < deadline - 20 ? [`room${n}`] : []));
            const late = sentAt.flatMap((time, n) => (time > deadline + 20 ? [n] : []));
            expect(early.length).toBeGreaterThan(0);
            expect(late.length).toBeGreaterThan(0);
            for (const id of early) {
                expect(devices.has(id)).toBe(true);
            }
            for (const n of late) {
                expect(devices.has(`room${n}`)).toBe(false);
                expect(hits[`/room-${n}.xml`]).toBeUndefined();
            }
        } finally {
            clearInterval(timer);
            await responder.close();
        }
    });

    it('should return an empty map when nothing answers', async () => {
        const network = createInMemorySsdpNetwork();
        const client = new DiscoveryClient({ timeoutMs: 50, transportFactory: network.factory });

        const devices = await client.discover();

        expect(devices.size).toBe(0);
    });

    it('should return an empty map when the search cannot be sent', async () => {
        const close = vi.fn(async () => {});
        const client = new DiscoveryClient({
            timeoutMs: 50,
            transportFactory: async () => ({
                send: async () => { throw new Error('send failed'); },
                close,
                address: () => ({ address: '127.0.0.1', port: 50000 }),
            }),
        });

        const devices = await client.discover();

        expect(devices.size).toBe(0);
        expect(close).toHaveBeenCalledTimes(1);
    });

    it('should propagate a transport bind failure', async () => {
        const client = new DiscoveryClient({
            timeoutMs: 50,
            transportFactory: async () => { throw new Error('EADDRINUSE'); },
        });

        await expect(client.discover()).rejects.toThrow('EADDRINUSE');
    });
});
