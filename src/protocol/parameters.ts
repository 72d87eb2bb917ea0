/**
 * Parameters kept fresh when the configuration does not list its own.
 */
export const DEFAULT_PARAMETERS: readonly string[] = [
  // Analog inputs
  'in-a:voltage',
  'in-b:voltage',

  // Fan
  'fan:enabled',
  'fan:duty-cycle',
  'fan:rpm',

  // 0-10V outputs
  'out-a:enabled',
  'out-a:voltage',
  'out-b:enabled',
  'out-b:voltage',
  'out-c:enabled',
  'out-c:voltage',
  'out-d:enabled',
  'out-d:voltage',
  'out-e:enabled',
  'out-e:voltage',
  'out-f:enabled',
  'out-f:voltage',

  // Power switches
  'switch-12v:enabled',
  'switch-24v-a:enabled',
  'switch-24v-b:enabled',
];
