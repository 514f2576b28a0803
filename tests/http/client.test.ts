import axios from 'axios';
import { HttpClient, isAcceptedStatus } from '../../src/http/client';
import { CONNECTIVITY_MESSAGE, TransportError } from '../../src/domain/errors';
import { createMockLogger } from '../helpers';

jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

function createMockAxiosInstance(options: { response?: unknown; error?: unknown }) {
    return {
        get: jest.fn().mockImplementation(() => (
            options.error ? Promise.reject(options.error) : Promise.resolve(options.response)
        )),
        interceptors: {
            request: { use: jest.fn() },
            response: { use: jest.fn() },
        },
    };
}

describe('HttpClient', () => {

    beforeEach(() => {
        jest.clearAllMocks();
        mockedAxios.isAxiosError.mockReturnValue(false);
    });

    function createClientWithMock(options: Parameters<typeof createMockAxiosInstance>[0]) {
        const mockInstance = createMockAxiosInstance(options);
        mockedAxios.create.mockReturnValue(mockInstance as any);
        const logger = createMockLogger();
        const client = new HttpClient('fraktjakt', { baseURL: 'http://api2.fraktjakt.se', timeoutMs: 5000, logger });
        return { client, mockInstance, logger };
    }

    it('should create the axios instance with base url, timeout and xml accept header', () => {
        createClientWithMock({});

        expect(mockedAxios.create).toHaveBeenCalledWith(expect.objectContaining({
            baseURL: 'http://api2.fraktjakt.se',
            timeout: 5000,
            headers: { 'Accept': 'application/xml, text/xml' },
        }));
    });

    it('should register timing interceptors', () => {
        const { mockInstance } = createClientWithMock({});

        expect(mockInstance.interceptors.request.use).toHaveBeenCalledTimes(1);
        expect(mockInstance.interceptors.response.use).toHaveBeenCalledTimes(1);
    });

    it('should wrap the response and flatten its headers', async () => {
        const { client, mockInstance } = createClientWithMock({
            response: {
                status: 200,
                data: '<result/>',
                headers: { 'content-type': 'text/xml', 'content-length': 9 },
                config: {},
            },
        });

        const response = await client.get<string>('/trace/xml_trace/4711', { responseType: 'arraybuffer' });

        expect(mockInstance.get).toHaveBeenCalledWith('/trace/xml_trace/4711', { responseType: 'arraybuffer' });
        expect(response).toEqual({
            status: 200,
            data: '<result/>',
            headers: { 'content-type': 'text/xml', 'content-length': '9' },
        });
    });

    it('should turn an error status into the connectivity error', async () => {
        const error503: any = new Error('Request failed with status code 503');
        error503.isAxiosError = true;
        error503.response = { status: 503, data: 'Service Unavailable' };
        mockedAxios.isAxiosError.mockReturnValue(true);
        const { client, logger } = createClientWithMock({ error: error503 });

        const error = await client.get('/fraktjakt/query_xml').catch((err: unknown) => err);

        expect(error).toBeInstanceOf(TransportError);
        expect(error).toHaveProperty('message', CONNECTIVITY_MESSAGE);
        expect(error).toHaveProperty('statusCode', 503);
        expect(logger.warn).toHaveBeenCalledWith('fraktjakt request failed', expect.objectContaining({ status: 503 }));
    });

    it('should turn a timeout into the connectivity error without a status', async () => {
        const timeoutErr: any = new Error('timeout of 5000ms exceeded');
        timeoutErr.isAxiosError = true;
        timeoutErr.code = 'ECONNABORTED';
        mockedAxios.isAxiosError.mockReturnValue(true);
        const { client } = createClientWithMock({ error: timeoutErr });

        const error = await client.get('/fraktjakt/query_xml').catch((err: unknown) => err);

        expect(error).toBeInstanceOf(TransportError);
        expect(error).toHaveProperty('code', 'TRANSPORT_ERROR');
        expect(error).toHaveProperty('statusCode', undefined);
    });

    it('should wrap unexpected errors as well', async () => {
        const { client } = createClientWithMock({ error: new Error('socket hang up') });

        await expect(client.get('/fraktjakt/query_xml')).rejects.toThrow(CONNECTIVITY_MESSAGE);
    });
});

describe('isAcceptedStatus', () => {
    it('should accept success and redirect statuses only', () => {
        expect(isAcceptedStatus(200)).toBe(true);
        expect(isAcceptedStatus(302)).toBe(true);
        expect(isAcceptedStatus(404)).toBe(false);
        expect(isAcceptedStatus(500)).toBe(false);
    });
});
