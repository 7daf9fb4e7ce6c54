import { SetMetadata } from '@nestjs/common';

export const INGESTION_ROUTE = 'rate-limit:ingestion';

/** Opts a handler into the stricter `ingest` throttler. */
export const IngestionRoute = () => SetMetadata(INGESTION_ROUTE, true);
