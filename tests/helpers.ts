import fs from 'fs';
import path from 'path';
import { AppConfig, DEFAULT_BASE_URLS } from '../src/config';
import { Address, Environment, Parcel } from '../src/domain/models';
import { Logger } from '../src/logging/logger';

export const TEST_CONSIGNOR = {
    consignorId: '12345',
    consignorKey: 'test-key',
    currency: 'SEK',
    language: 'sv',
};

export const TEST_CONFIG: AppConfig = {
    nodeEnv: 'test',
    requestTimeoutMs: 5000,
    debug: false,
    fraktjakt: {
        ...TEST_CONSIGNOR,
        environment: Environment.Test,
        baseUrls: { ...DEFAULT_BASE_URLS },
    },
};

export function buildSampleAddress(overrides?: Partial<Address>): Address {
    return {
        street1: 'Storgatan 1',
        postalCode: '11122',
        cityName: 'Stockholm',
        ...overrides,
    };
}

export function buildSampleParcel(overrides?: Partial<Parcel>): Parcel {
    return {
        weight: 2.5,
        length: 30,
        width: 20,
        height: 10,
        ...overrides,
    };
}

export function loadFixture(name: string): Buffer {
    return fs.readFileSync(path.join(__dirname, 'fixtures', name));
}

export function createMockLogger(): jest.Mocked<Logger> {
    return {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    };
}
