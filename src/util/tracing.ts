import {
  trace,
  SpanStatusCode,
  type Span,
  type Tracer,
  type SpanOptions,
} from "@opentelemetry/api";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import {
  SimpleSpanProcessor,
  InMemorySpanExporter,
  type ReadableSpan,
  type SpanExporter,
} from "@opentelemetry/sdk-trace-base";
import {
  ExportResultCode,
  hrTimeToMicroseconds,
  type ExportResult,
} from "@opentelemetry/core";
import { Resource } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import type { TracingConfig } from "../config/types.js";
import { SERVICE_NAME, SERVICE_VERSION } from "../config/constants.js";

let tracer: Tracer | null = null;
let provider: NodeTracerProvider | null = null;
let memoryExporter: InMemorySpanExporter | null = null;
let isInitialized = false;

export const SPAN_NAMES = {
  PARSE: "cpg.parse",
  EXTRACT: "cpg.extract",
  UDF_FILTER: "cpg.filter",
  VERIFY_EXTRACTION: "cpg.verify.extraction",
  VERIFY_UDF_FILTER: "cpg.verify.filter",
  PIPELINE: "cpg.run",
  SCHEMA: "cpg.schema",
} as const;

/**
 * Prints finished spans as one JSON line each on stderr. stdout carries
 * graph text and the MCP stdio stream, so span dumps must stay off it.
 */
export class StderrSpanExporter implements SpanExporter {
  private stopped = false;

  constructor(
    private readonly writeLine: (line: string) => void = (line) => {
      process.stderr.write(line + "\n");
    },
  ) {}

  export(spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void {
    if (this.stopped) {
      resultCallback({ code: ExportResultCode.FAILED });
      return;
    }
    for (const span of spans) {
      this.writeLine(
        JSON.stringify({
          traceId: span.spanContext().traceId,
          parentId: span.parentSpanId,
          name: span.name,
          id: span.spanContext().spanId,
          timestamp: hrTimeToMicroseconds(span.startTime),
          duration: hrTimeToMicroseconds(span.duration),
          attributes: span.attributes,
          status: span.status,
        }),
      );
    }
    resultCallback({ code: ExportResultCode.SUCCESS });
  }

  shutdown(): Promise<void> {
    this.stopped = true;
    return Promise.resolve();
  }

  forceFlush(): Promise<void> {
    return Promise.resolve();
  }
}

export function isTracingEnabled(): boolean {
  return isInitialized && tracer !== null;
}

export function getMemoryExporter(): InMemorySpanExporter | null {
  return memoryExporter;
}

export function initTracing(config: TracingConfig): void {
  if (isInitialized) {
    return;
  }

  if (!config.enabled) {
    isInitialized = true;
    return;
  }

  const serviceName = config.serviceName ?? SERVICE_NAME;
  const resource = Resource.default().merge(
    new Resource({
      [ATTR_SERVICE_NAME]: serviceName,
    }),
  );

  provider = new NodeTracerProvider({ resource });

  if (config.exporterType === "memory") {
    memoryExporter = new InMemorySpanExporter();
    provider.addSpanProcessor(new SimpleSpanProcessor(memoryExporter));
  } else {
    provider.addSpanProcessor(new SimpleSpanProcessor(new StderrSpanExporter()));
  }

  provider.register();
  tracer = trace.getTracer(serviceName, SERVICE_VERSION);
  isInitialized = true;
}

export function shutdownTracing(): Promise<void> {
  if (provider) {
    return provider.shutdown();
  }
  return Promise.resolve();
}

export function getTracer(): Tracer {
  if (!tracer) {
    return trace.getTracer(SERVICE_NAME, SERVICE_VERSION);
  }
  return tracer;
}

export interface SpanAttributes {
  graph?: string;
  counts?: {
    nodes?: number;
    edges?: number;
    seeds?: number;
    issues?: number;
  };
  [key: string]:
    | string
    | number
    | boolean
    | undefined
    | Record<string, string | number | boolean | undefined>;
}

function flattenAttributes(
  attrs: SpanAttributes,
): Record<string, string | number | boolean> {
  const result: Record<string, string | number | boolean> = {};

  for (const [key, value] of Object.entries(attrs)) {
    if (value === undefined) continue;

    if (typeof value === "object") {
      for (const [subKey, subValue] of Object.entries(value)) {
        if (subValue !== undefined) {
          result[`${key}.${subKey}`] = subValue;
        }
      }
    } else {
      result[key] = value;
    }
  }

  return result;
}

export function startSpan(
  name: string,
  attributes?: SpanAttributes,
  options?: SpanOptions,
): { span: Span; end: (error?: Error) => void } {
  const span = getTracer().startSpan(name, {
    ...options,
    attributes: attributes ? flattenAttributes(attributes) : undefined,
  });

  const end = (error?: Error): void => {
    if (error) {
      span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
    } else {
      span.setStatus({ code: SpanStatusCode.OK });
    }
    span.end();
  };

  return { span, end };
}

export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  attributes?: SpanAttributes,
): Promise<T> {
  const { span, end } = startSpan(name, attributes);

  try {
    const result = await fn(span);
    end();
    return result;
  } catch (error) {
    end(error instanceof Error ? error : new Error(String(error)));
    throw error;
  }
}

export function withSpanSync<T>(
  name: string,
  fn: (span: Span) => T,
  attributes?: SpanAttributes,
): T {
  const { span, end } = startSpan(name, attributes);

  try {
    const result = fn(span);
    end();
    return result;
  } catch (error) {
    end(error instanceof Error ? error : new Error(String(error)));
    throw error;
  }
}

export function setSpanAttributes(
  span: Span,
  attributes: SpanAttributes,
): void {
  span.setAttributes(flattenAttributes(attributes));
}

export async function resetTracingForTest(): Promise<void> {
  if (provider) {
    await provider.shutdown();
  }
  trace.disable();
  tracer = null;
  provider = null;
  memoryExporter = null;
  isInitialized = false;
}
