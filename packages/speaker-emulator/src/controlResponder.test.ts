import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { once } from 'events';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import axios from 'axios';
import express from 'express';
import {
    buildPlayEnvelope,
    buildSetAVTransportURIEnvelope,
    delay,
    parseDeviceDescription,
    AVTRANSPORT_SERVICE_TYPE,
    SOAP_CONTENT_TYPE,
    type CommandRunner,
} from '@lan-announcer/core';
import { startLoopbackServer, type LoopbackServer } from '@lan-announcer/core/testing';

import {
    ControlResponder,
    buildActionResponse,
    buildDeviceDescription,
    parseSoapActionName,
    type ControlResponderOptions,
    type MediaVerification,
} from './controlResponder';
import { EmulatedSpeaker } from './emulatedSpeaker';

const CONTROL_PATH = '/MediaRenderer/AVTransport/Control';

describe('parseSoapActionName', () => {
    it('should take the text after the last # and trim quotes', () => {
        expect(parseSoapActionName(`"${AVTRANSPORT_SERVICE_TYPE}#SetAVTransportURI"`)).toBe('SetAVTransportURI');
        expect(parseSoapActionName('a#b#Play')).toBe('Play');
        expect(parseSoapActionName('Stop')).toBe('Stop');
        expect(parseSoapActionName('')).toBe('');
    });
});

describe('buildActionResponse', () => {
    it('should name the action response element', () => {
        expect(buildActionResponse('Play')).toBe(
            '<?xml version="1.0"?>\n' +
            '<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/">\n' +
            '  <s:Body>\n' +
            '    <u:PlayResponse xmlns:u="urn:schemas-upnp-org:service:AVTransport:1"/>\n' +
            '  </s:Body>\n' +
            '</s:Envelope>'
        );
    });

    it('should answer UnknownResponse for names that are not XML names', () => {
        expect(buildActionResponse('')).toContain('<u:UnknownResponse ');
        expect(buildActionResponse('<x>')).toContain('<u:UnknownResponse ');
    });
});

describe('buildDeviceDescription', () => {
    it('should embed the speaker name and parse back to the same record', async () => {
        const xml = buildDeviceDescription('Kids & Den');

        expect(xml).toContain('<roomName>Kids &amp; Den</roomName>');
        expect(xml).toContain('<modelName>ZonePlayer (Emulated)</modelName>');
        await expect(parseDeviceDescription(xml, 'http://10.0.0.9:1400/xml/device_description.xml')).resolves.toEqual({
            displayName: 'Kids & Den',
            stableId: 'kids&den',
            controlBaseUrl: 'http://10.0.0.9:1400',
        });
    });
});

describe('ControlResponder', () => {
    let media: LoopbackServer;
    const mediaHits: string[] = [];
    let server: LoopbackServer | undefined;

    beforeAll(async () => {
        const app = express();
        app.get('/tts/ok.mp3', (req, res) => {
            mediaHits.push(`${req.method} ${req.path}`);
            res.type('audio/mpeg').send(Buffer.alloc(64, 1));
        });
        app.use((req, res) => {
            mediaHits.push(`${req.method} ${req.path}`);
            res.status(404).send('missing');
        });
        media = await startLoopbackServer(app);
    });

    afterAll(async () => {
        await media.close();
    });

    afterEach(async () => {
        await server?.close();
        server = undefined;
        mediaHits.length = 0;
    });

    async function startResponder(options: ControlResponderOptions = {}) {
        const speaker = new EmulatedSpeaker('Kitchen', 0);
        const responder = new ControlResponder(speaker, options);
        server = await startLoopbackServer(responder.app);
        return { speaker, responder, baseUrl: server.baseUrl };
    }

    function sendAction(baseUrl: string, action: string, envelope: string) {
        return axios.post<string>(`${baseUrl}${CONTROL_PATH}`, envelope, {
            headers: {
                'Content-Type': SOAP_CONTENT_TYPE,
                SOAPAction: `"${AVTRANSPORT_SERVICE_TYPE}#${action}"`,
            },
            responseType: 'text',
            validateStatus: () => true,
        });
    }

    it('should serve the device description as XML', async () => {
        const { baseUrl } = await startResponder();

        const res = await axios.get<string>(`${baseUrl}/xml/device_description.xml`, { responseType: 'text' });

        expect(res.status).toBe(200);
        expect(res.headers['content-type']).toMatch(/^text\/xml/);
        expect(res.data).toContain('<roomName>Kitchen</roomName>');
        expect(res.data).toContain('<displayName>Kitchen</displayName>');
    });

    it('should store the unescaped media URL on SetAVTransportURI', async () => {
        const { speaker, baseUrl } = await startResponder();
        const mediaUrl = 'http://10.0.0.50:8080/a&b<c>"d".mp3';

        const res = await sendAction(baseUrl, 'SetAVTransportURI', buildSetAVTransportURIEnvelope(mediaUrl));

        expect(res.status).toBe(200);
        expect(res.data).toBe(buildActionResponse('SetAVTransportURI'));
        expect(speaker.lastMediaUri).toBe(mediaUrl);
    });

    it('should replace the stored URL on a later SetAVTransportURI', async () => {
        const { speaker, baseUrl } = await startResponder();

        await sendAction(baseUrl, 'SetAVTransportURI', buildSetAVTransportURIEnvelope('http://10.0.0.50:8080/1.mp3'));
        await sendAction(baseUrl, 'SetAVTransportURI', buildSetAVTransportURIEnvelope('http://10.0.0.50:8080/2.mp3'));

        expect(speaker.lastMediaUri).toBe('http://10.0.0.50:8080/2.mp3');
    });

    it('should answer unknown actions with a success envelope', async () => {
        const { speaker, baseUrl } = await startResponder();
        speaker.lastMediaUri = 'http://10.0.0.50:8080/keep.mp3';

        const res = await sendAction(baseUrl, 'Pause', '<Pause/>');

        expect(res.status).toBe(200);
        expect(res.data).toContain('<u:PauseResponse xmlns:u="urn:schemas-upnp-org:service:AVTransport:1"/>');
        expect(speaker.lastMediaUri).toBe('http://10.0.0.50:8080/keep.mp3');
    });

    it('should answer UnknownResponse when the SOAPAction header is missing', async () => {
        const { baseUrl } = await startResponder();

        const res = await axios.post<string>(`${baseUrl}${CONTROL_PATH}`, '<x/>', {
            headers: { 'Content-Type': SOAP_CONTENT_TYPE },
            responseType: 'text',
        });

        expect(res.status).toBe(200);
        expect(res.data).toBe(buildActionResponse('Unknown'));
    });

    it('should not touch the media URL on Play when verification is off', async () => {
        const { speaker, baseUrl } = await startResponder();
        speaker.lastMediaUri = `${media.baseUrl}/tts/ok.mp3`;

        const res = await sendAction(baseUrl, 'Play', buildPlayEnvelope());
        await delay(50);

        expect(res.status).toBe(200);
        expect(res.data).toBe(buildActionResponse('Play'));
        expect(mediaHits).toEqual([]);
    });

    it('should verify the media URL with HEAD after Play', async () => {
        const { speaker, responder, baseUrl } = await startResponder({ verify: 'head' });
        speaker.lastMediaUri = `${media.baseUrl}/tts/ok.mp3`;
        const verified = once(responder, 'verified');

        await sendAction(baseUrl, 'Play', buildPlayEnvelope());
        const [result] = await verified;

        expect(result).toEqual<MediaVerification>({
            speaker: 'Kitchen',
            uri: `${media.baseUrl}/tts/ok.mp3`,
            mode: 'head',
            ok: true,
            status: 200,
            bytes: undefined,
        });
        expect(mediaHits).toEqual(['HEAD /tts/ok.mp3']);
    });

    it('should fetch the whole file in fetch mode', async () => {
        const { speaker, responder, baseUrl } = await startResponder({ verify: 'fetch' });
        speaker.lastMediaUri = `${media.baseUrl}/tts/ok.mp3`;
        const verified = once(responder, 'verified');

        await sendAction(baseUrl, 'Play', buildPlayEnvelope());
        const [result] = await verified;

        expect(result).toMatchObject({ mode: 'fetch', ok: true, status: 200, bytes: 64 });
        expect(mediaHits).toEqual(['GET /tts/ok.mp3']);
    });

    it('should report a missing media file as a failed verification', async () => {
        const { speaker, responder, baseUrl } = await startResponder({ verify: 'fetch' });
        speaker.lastMediaUri = `${media.baseUrl}/tts/missing.mp3`;
        const verified = once(responder, 'verified');

        const res = await sendAction(baseUrl, 'Play', buildPlayEnvelope());
        const [result] = await verified;

        expect(res.status).toBe(200);
        expect(result).toMatchObject({ ok: false, status: 404 });
    });

    describe('play mode', () => {
        let tempDir: string;

        afterEach(async () => {
            await fs.rm(tempDir, { recursive: true, force: true });
        });

        async function startPlayingResponder(runCommand: CommandRunner) {
            tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'emulator-play-'));
            return startResponder({ verify: 'play', runCommand, tempDir });
        }

        it('should download the media to a temp file, run afplay on it and remove the file', async () => {
            const calls: Array<{ command: string; args: string[]; size: number }> = [];
            const { speaker, responder, baseUrl } = await startPlayingResponder(async (command, args) => {
                const stat = await fs.stat(args[0]);
                calls.push({ command, args, size: stat.size });
            });
            speaker.lastMediaUri = `${media.baseUrl}/tts/ok.mp3`;
            const verified = once(responder, 'verified');

            await sendAction(baseUrl, 'Play', buildPlayEnvelope());
            const [result] = await verified;

            expect(result).toMatchObject({ mode: 'play', ok: true, status: 200, bytes: 64 });
            expect(calls).toHaveLength(1);
            expect(calls[0].command).toBe('afplay');
            expect(path.dirname(calls[0].args[0])).toBe(tempDir);
            expect(path.extname(calls[0].args[0])).toBe('.mp3');
            expect(calls[0].size).toBe(64);
            expect(await fs.readdir(tempDir)).toEqual([]);
        });

        it('should not run the player when the media cannot be downloaded', async () => {
            const calls: string[] = [];
            const { speaker, responder, baseUrl } = await startPlayingResponder(async (command) => {
                calls.push(command);
            });
            speaker.lastMediaUri = `${media.baseUrl}/tts/missing.mp3`;
            const verified = once(responder, 'verified');

            await sendAction(baseUrl, 'Play', buildPlayEnvelope());
            const [result] = await verified;

            expect(result).toMatchObject({ mode: 'play', ok: false, status: 404 });
            expect(calls).toEqual([]);
        });

        it('should report a player failure and still remove the temp file', async () => {
            const { speaker, responder, baseUrl } = await startPlayingResponder(async () => {
                throw new Error('afplay exited with code 1');
            });
            speaker.lastMediaUri = `${media.baseUrl}/tts/ok.mp3`;
            const verified = once(responder, 'verified');

            const res = await sendAction(baseUrl, 'Play', buildPlayEnvelope());
            const [result] = await verified;

            expect(res.status).toBe(200);
            expect(result).toMatchObject({ mode: 'play', ok: false, error: 'afplay exited with code 1' });
            expect(await fs.readdir(tempDir)).toEqual([]);
        });
    });

    it('should listen on an ephemeral port and record it on the speaker', async () => {
        const speaker = new EmulatedSpeaker('Office', 0);
        const responder = new ControlResponder(speaker);

        const port = await responder.start('127.0.0.1');
        try {
            expect(port).toBeGreaterThan(0);
            expect(speaker.port).toBe(port);
            const res = await axios.get<string>(`http://127.0.0.1:${port}/xml/device_description.xml`, { responseType: 'text' });
            expect(res.data).toContain('<roomName>Office</roomName>');
        } finally {
            await responder.stop();
        }
    });
});
