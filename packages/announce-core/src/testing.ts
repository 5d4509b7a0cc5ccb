// עזרי בדיקה: שרת HTTP מקומי ורשת SSDP בתוך התהליך. לא חלק מהממשק של הספרייה.
export { startLoopbackServer } from './httpTestServer';
export type { LoopbackServer } from './httpTestServer';
export { createInMemorySsdpNetwork } from './ssdpSocketManager';
export type { InMemorySsdpNetwork } from './ssdpSocketManager';
