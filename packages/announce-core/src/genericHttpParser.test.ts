import { describe, it, expect } from 'vitest';
import { parseHttpPacket, findHeaderInRawMessage, HTTP_REQUEST_TYPE, HTTP_RESPONSE_TYPE } from './genericHttpParser';
import { buildMSearchMessage } from './ssdpSocketManager';

describe('parseHttpPacket', () => {
    it('should parse the M-SEARCH request we send', () => {
        const result = parseHttpPacket(Buffer.from(buildMSearchMessage()), HTTP_REQUEST_TYPE);

        expect(result).not.toBeNull();
        if (!result) return; // Type guard

        expect(result.method).toBe('M-SEARCH');
        expect(result.url).toBe('*');
        expect(result.versionMajor).toBe(1);
        expect(result.versionMinor).toBe(1);
        expect(result.headers).toEqual({
            host: '239.255.255.250:1900',
            man: '"ssdp:discover"',
            mx: '3',
            st: 'urn:schemas-upnp-org:device:ZonePlayer:1'
        });
        expect(result.statusCode).toBeUndefined();
    });

    it('should parse a discovery response without Content-Length', () => {
        const responseLines = [
            'HTTP/1.1 200 OK',
            'CACHE-CONTROL: max-age=1800',
            'LOCATION: http://192.168.1.10:1400/xml/device_description.xml',
            'ST: urn:schemas-upnp-org:device:ZonePlayer:1',
            'USN: uuid:RINCON_TEST',
            '',
            ''
        ];
        const result = parseHttpPacket(Buffer.from(responseLines.join('\r\n')), HTTP_RESPONSE_TYPE);

        expect(result).not.toBeNull();
        if (!result) return; // Type guard

        expect(result.statusCode).toBe(200);
        expect(result.statusMessage).toBe('OK');
        expect(result.method).toBeUndefined();
        expect(result.headers['location']).toBe('http://192.168.1.10:1400/xml/device_description.xml');
        expect(result.headers['usn']).toBe('uuid:RINCON_TEST');
        expect(result.body).toBeUndefined();
    });

    it('should lower-case header names of mixed-case responses', () => {
        const responseLines = [
            'HTTP/1.1 200 OK',
            'Location: http://10.0.0.5:1400/desc.xml',
            'Content-Length: 0',
            '',
            ''
        ];
        const result = parseHttpPacket(Buffer.from(responseLines.join('\r\n')), HTTP_RESPONSE_TYPE);

        expect(result?.headers).toEqual({
            location: 'http://10.0.0.5:1400/desc.xml',
            'content-length': '0'
        });
    });

    it('should parse a POST request with body', () => {
        const requestLines = [
            'POST /submit HTTP/1.1',
            'Host: example.com',
            'Content-Length: 15',
            '',
            '{"key":"value"}'
        ];
        const result = parseHttpPacket(Buffer.from(requestLines.join('\r\n')), HTTP_REQUEST_TYPE);

        expect(result).not.toBeNull();
        if (!result) return; // Type guard

        expect(result.method).toBe('POST');
        expect(result.url).toBe('/submit');
        expect(result.body?.toString()).toBe('{"key":"value"}');
    });

    it('should return null for malformed request', () => {
        const malformedLines = [
            'INVALID_REQUEST_LINE',
            'Host: example.com',
            '',
            ''
        ];
        const result = parseHttpPacket(Buffer.from(malformedLines.join('\r\n')), HTTP_REQUEST_TYPE);
        expect(result).toBeNull();
    });
});

describe('findHeaderInRawMessage', () => {
    const message = 'HTTP/1.1 200 OK\r\nlocation:   http://10.0.0.7:1400/x.xml  \r\nST: test\r\n\r\n';

    it('should match header names case-insensitively and trim the value', () => {
        expect(findHeaderInRawMessage(message, 'LOCATION')).toBe('http://10.0.0.7:1400/x.xml');
        expect(findHeaderInRawMessage(message, 'st')).toBe('test');
    });

    it('should return undefined when the header is absent', () => {
        expect(findHeaderInRawMessage(message, 'USN')).toBeUndefined();
    });
});
