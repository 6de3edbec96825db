import { AxiosInstance } from 'axios';
import { AppConfig } from '@/lib/config';
import { TimeSeriesStore } from '@/lib/timeSeriesStore';
import { DWRClient } from './dwr';
import { RockReportClient } from './rockReport';
import { SourceClients } from './sourceClient';
import { USGSClient } from './usgs';
import { VirtualGageClient } from './virtualGages';
import { WYSEOClient } from './wyseo';

export function createSourceClients(
  http: AxiosInstance,
  store: TimeSeriesStore,
  config: Pick<AppConfig, 'plotDays' | 'timeZone'>
): SourceClients {
  return {
    USGS: new USGSClient(http, config),
    DWR: new DWRClient(http, config),
    WYSEO: new WYSEOClient(http, config),
    PRR: new RockReportClient(http),
    VIRTUAL: new VirtualGageClient(store, config),
  };
}
