export type ProductType = 'catalina' | 'owl' | 'lotus';

export interface LoginResponse {
  account?: {
    account_id?: number;
    client_id?: number;
    tier?: string;
    region?: string;
    account_verification_required?: boolean;
    client_verification_required?: boolean;
    phone_verification_required?: boolean;
  };
  auth?: {
    token?: string;
  };
}

export type VerifyResponse = {
  valid?: boolean;
  message?: string;
};

export type BlinkNetwork = {
  id: number;
  name: string;
  armed: boolean;
};

export type NetworksResponse = {
  networks?: Array<Partial<BlinkNetwork> & { id: number }>;
};

export interface BlinkSyncModuleSummary {
  id: number;
  name?: string;
  network_id: number;
  serial?: string;
  status?: string;
  local_storage_enabled?: boolean;
  local_storage_compatible?: boolean;
  local_storage_status?: string;
}

export type SyncModuleResponse = {
  syncmodule?: BlinkSyncModuleSummary;
};

export interface BlinkDeviceResponse {
  id: number;
  name?: string;
  network_id?: number;
  serial?: string;
  enabled?: boolean;
  thumbnail?: string;
  battery?: string;
  battery_state?: string;
  battery_voltage?: number;
  temperature?: number;
  wifi_strength?: number;
  signals?: {
    wifi?: number;
    lfr?: number;
    temp?: number;
    battery?: number;
  };
  updated_at?: string;
}

export type SummaryResponse = {
  account?: { id?: number };
  networks?: Array<Partial<BlinkNetwork> & { id: number }>;
  sync_modules?: BlinkSyncModuleSummary[];
  cameras?: BlinkDeviceResponse[];
  owls?: BlinkDeviceResponse[];
  doorbells?: BlinkDeviceResponse[];
};

export type SyncEvent = {
  id?: number;
  type?: string;
  camera_name?: string;
  created_at?: string;
};

export type SyncEventsResponse = {
  event?: SyncEvent[];
};

export type CameraUsageResponse = {
  networks?: Array<{
    network_id: number;
    name?: string;
    cameras?: Array<{ id: number; name: string }>;
  }>;
};

export type CameraConfigResponse = {
  camera?: BlinkDeviceResponse[];
};

export type CameraSignalsResponse = {
  lfr?: number;
  wifi?: number;
  temp?: number;
  battery?: number;
};

export type CommandResponse = {
  id?: number;
  network_id?: number;
  state?: string;
};

export type CommandStatusResponse = {
  complete?: boolean;
  status?: number;
  status_code?: number;
  status_msg?: string;
};

export type LiveviewResponse = {
  server?: string;
};

export type VideoResponse = {
  id: number;
  created_at: string;
  device_name: string;
  media: string;
  thumbnail?: string;
  deleted?: boolean;
};

export type VideosPageResponse = {
  media?: VideoResponse[];
};

export type VideoCountResponse = {
  count?: number;
};

export type LocalStorageManifestRequestResponse = {
  id?: number;
  network_id?: number;
};

export type LocalStorageManifestResponse = {
  manifest_id?: string;
  clips?: Array<{
    id: string;
    size?: string | number;
    camera_name: string;
    created_at: string;
  }>;
};

export type MotionEvent = {
  clip: string;
  time: string;
};

export type CachedMedia = {
  url: string;
  data: Buffer;
  fetchedAt: Date;
};
