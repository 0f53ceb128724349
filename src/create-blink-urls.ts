import { BLINK_URL } from './constants';

export type BlinkUrls = ReturnType<typeof createBlinkUrls>;

const createBlinkUrls = (regionId: string, accountId: number) => {
  const baseUrl = `https://rest-${regionId}.${BLINK_URL}`;
  const accountUrl = `${baseUrl}/api/v1/accounts/${accountId}`;

  return {
    baseUrl,
    accountUrl,
    networkUrl: `${baseUrl}/network/`,
    networksUrl: `${baseUrl}/networks`,
    armUrl: `${accountUrl}/networks/`,
    videoUrl: `${accountUrl}/media/changed`,
    homeUrl: `${baseUrl}/api/v3/accounts/${accountId}/homescreen`,
    clientUrl: (clientId: number) => `${baseUrl}/api/v4/account/${accountId}/client/${clientId}`
  };
};

export default createBlinkUrls;
