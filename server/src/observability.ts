/**
 * observability.ts
 *
 * OpenTelemetry SDK for tracing and metrics. Exports traces and metrics over
 * OTLP/HTTP and enables the Node.js auto-instrumentations (http, pg, ...).
 *
 * The SDK only starts when `OTEL_ENABLED` is set; `index.ts` calls
 * `startTelemetry` before the Fastify instance is created so the pg and http
 * modules get patched.
 */

import {NodeSDK, metrics} from '@opentelemetry/sdk-node';
import {getNodeAutoInstrumentations} from '@opentelemetry/auto-instrumentations-node';
import {OTLPTraceExporter} from '@opentelemetry/exporter-trace-otlp-http';
import {OTLPMetricExporter} from '@opentelemetry/exporter-metrics-otlp-http';
import type {AppConfig} from './config.js';

let sdk: NodeSDK | null = null;

export function startTelemetry(config: AppConfig) {
    if (!config.OTEL_ENABLED || sdk) return;
    sdk = new NodeSDK({
        serviceName: 'tcg-collection-tracker',
        traceExporter: new OTLPTraceExporter({
            url: config.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT,
        }),
        metricReader: new metrics.PeriodicExportingMetricReader({
            exporter: new OTLPMetricExporter({
                url: config.OTEL_EXPORTER_OTLP_METRICS_ENDPOINT,
            }),
            exportIntervalMillis: 10000,
        }),
        instrumentations: [getNodeAutoInstrumentations({
            // fs spans drown out everything else when serving static files
            '@opentelemetry/instrumentation-fs': {enabled: false},
        })],
    });
    sdk.start();
}

export async function stopTelemetry() {
    if (!sdk) return;
    await sdk.shutdown();
    sdk = null;
}
