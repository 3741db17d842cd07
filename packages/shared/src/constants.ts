/**
 * Protocol and client constants shared across fieldlink packages.
 *
 * @module shared/constants
 */

/** Name of the one endpoint every device agent exposes without discovery. */
export const BOOTSTRAP_ENDPOINT = 'get_call_info';

/** Numeric id of the bootstrap endpoint. */
export const BOOTSTRAP_ENDPOINT_ID = 0;

/** Status code of a successful device API response. */
export const STATUS_OK = 0;

/** Status code that terminates an event stream. */
export const STATUS_END_OF_STREAM = 0xffff;

/** Default bounded wait for a device API call response (ms). */
export const DEFAULT_CALL_TIMEOUT_MS = 5_000;

/** REST path of the device API socket. */
export const DEVICE_API_PATH = 'iot/device_api';

/** REST path of the live device event socket. */
export const DEVICE_EVENTS_PATH = 'iot/device_events';

/** Device id meaning "every device" for event subscriptions. */
export const ALL_DEVICES = -1;

/** Default number of events returned by the event log. */
export const DEFAULT_EVENT_LIMIT = 10;
