// From logger.ts
export {
    default as createLogger,
    createModuleLogger,
    formatLogMetadata,
} from './logger';
export type { LogLevel, ModuleLogger } from './logger';

// From types.ts
export type * from './types';

// From envLoader.ts / configLoader.ts
export {
    loadEnvFiles,
    getProcessedEnv,
    isStringLosslesslyNumeric,
} from './envLoader';
export type { ProcessedEnv } from './envLoader';
export {
    initializeConfig,
    envVarNameFor,
    camelToSnakeCase,
} from './configLoader';
export type { ConfigLeaf, ConfigTree } from './configLoader';

// From xmlUtils.ts
export {
    escapeXml,
    unescapeXml,
    extractTagValue,
} from './xmlUtils';

// From genericHttpParser.ts
export {
    parseHttpPacket,
    findHeaderInRawMessage,
    HTTP_REQUEST_TYPE,
    HTTP_RESPONSE_TYPE,
} from './genericHttpParser';
export type { ParsedHttpPacket, HttpParserType } from './genericHttpParser';

// From ssdpSocketManager.ts
export {
    SSDP_PORT,
    SSDP_MULTICAST_ADDRESS,
    ZONE_PLAYER_SEARCH_TARGET,
    DEFAULT_MX_SECONDS,
    buildMSearchMessage,
    createUdpSsdpTransport,
    udpSsdpTransportFactory,
    findLocalIPv4Address,
    findRelevantNetworkInterfaces,
} from './ssdpSocketManager';

// From descriptorParser.ts
export {
    parseDeviceDescription,
    deriveStableId,
    deriveControlBaseUrl,
} from './descriptorParser';

// From discoveryClient.ts
export { DiscoveryClient } from './discoveryClient';

// From deviceRegistry.ts
export { DeviceRegistry } from './deviceRegistry';

// From controlClient.ts
export {
    ControlClient,
    ControlActionError,
    buildSetAVTransportURIEnvelope,
    buildPlayEnvelope,
    controlUrlFor,
    AVTRANSPORT_SERVICE_TYPE,
    AVTRANSPORT_CONTROL_PATH,
    SOAP_CONTENT_TYPE,
} from './controlClient';

// From commandRunner.ts
export { execFileRunner } from './commandRunner';
export type { CommandRunner } from './commandRunner';

// From utils.ts
export { delay } from './utils';

