import type { Faker } from "@faker-js/faker";

/**
 * IPv4 address from one of the three private ranges
 */
export function privateIPv4(random: Faker): string {
  const octet = () => random.number.int({ min: 0, max: 255 });
  const host = random.number.int({ min: 1, max: 254 });

  switch (random.number.int({ min: 0, max: 2 })) {
    case 0:
      return `10.${octet()}.${octet()}.${host}`;
    case 1:
      return `172.${random.number.int({ min: 16, max: 31 })}.${octet()}.${host}`;
    default:
      return `192.168.${octet()}.${host}`;
  }
}

/**
 * Six random byte pairs, colon separated
 */
export function macAddress(random: Faker): string {
  return Array.from({ length: 6 }, () =>
    random.number.int({ min: 0, max: 255 }).toString(16).padStart(2, "0"),
  ).join(":");
}

/**
 * Port in the registered/ephemeral range
 */
export function port(random: Faker): number {
  return random.number.int({ min: 1024, max: 65535 });
}
