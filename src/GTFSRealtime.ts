import * as path from 'path';
import { IConversionOptions, loadSync, Reader } from 'protobufjs';
import { describeError, FeedError } from './Errors';
import {
    FeedEntityObject,
    FeedHeaderObject,
    TripDescriptorObject,
} from './RealtimeTypes';
import {
    Failure,
    ParsedRealtimeMessage,
    REALTIME_KINDS,
    RealtimeKind,
    RealtimeRecord,
    TripUpdateRecord,
    VehiclePositionRecord,
} from './types';

// GTFS-Realtime decoding. Documentation for the format is at https://gtfs.org/realtime/reference/

export const PROTO_PATH = path.join(__dirname, '..', 'proto', 'gtfs-realtime.proto');

const root = loadSync(PROTO_PATH);
export const FeedMessageType = root.lookupType('transit_realtime.FeedMessage');
export const FeedHeaderType = root.lookupType('transit_realtime.FeedHeader');
export const FeedEntityType = root.lookupType('transit_realtime.FeedEntity');

const CONVERSION: IConversionOptions = { longs: Number, enums: String, defaults: false };

// FeedMessage field numbers and the length-delimited wire type
const HEADER_FIELD = 1;
const ENTITY_FIELD = 2;
const LENGTH_DELIMITED = 2;

export type RealtimeParseResult =
    | { ok: true; message: ParsedRealtimeMessage; skippedEntities: number }
    | { ok: false; failure: Failure };

export function isRealtimeKind(kind: string): kind is RealtimeKind {
    return REALTIME_KINDS.some((known) => known === kind);
}

function setIfDefined<T, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
    if (value !== undefined) {
        target[key] = value;
    }
}

// The envelope is walked by hand so each entity can be decoded (and rejected) on its own
function readEnvelope(bytes: Uint8Array): { header: FeedHeaderObject; entities: Uint8Array[] } {
    const reader = Reader.create(bytes);
    let header: FeedHeaderObject | undefined;
    const entities: Uint8Array[] = [];

    while (reader.pos < reader.len) {
        const tag = reader.uint32();
        const field = tag >>> 3;
        const wireType = tag & 7;

        if (field === HEADER_FIELD && wireType === LENGTH_DELIMITED) {
            header = FeedHeaderType.toObject(FeedHeaderType.decode(reader.bytes()), CONVERSION);
        } else if (field === ENTITY_FIELD && wireType === LENGTH_DELIMITED) {
            entities.push(reader.bytes());
        } else {
            reader.skipType(wireType);
        }
    }

    if (!header) {
        throw new FeedError('decode', 'FeedMessage has no header');
    }
    return { header, entities };
}

function applyTrip(record: TripUpdateRecord | VehiclePositionRecord, trip: TripDescriptorObject | undefined): void {
    if (!trip) return;
    setIfDefined(record, 'tripId', trip.tripId);
    setIfDefined(record, 'routeId', trip.routeId);
    setIfDefined(record, 'directionId', trip.directionId);
    setIfDefined(record, 'startTime', trip.startTime);
    setIfDefined(record, 'startDate', trip.startDate);
}

export function toTripUpdateRecord(entity: FeedEntityObject): TripUpdateRecord | undefined {
    const update = entity.tripUpdate;
    if (!update) return undefined;

    const record: TripUpdateRecord = { type: 'trip_update', entityId: entity.id ?? '' };
    applyTrip(record, update.trip);
    setIfDefined(record, 'vehicleId', update.vehicle?.id);
    setIfDefined(record, 'timestamp', update.timestamp);
    setIfDefined(record, 'delaySeconds', update.delay);
    return record;
}

export function toVehiclePositionRecord(entity: FeedEntityObject): VehiclePositionRecord | undefined {
    const vehicle = entity.vehicle;
    if (!vehicle) return undefined;

    // Feeds that omit the vehicle descriptor key the entity by vehicle instead
    const record: VehiclePositionRecord = {
        type: 'vehicle_position',
        entityId: entity.id ?? '',
        vehicleId: vehicle.vehicle?.id ?? entity.id ?? '',
    };
    applyTrip(record, vehicle.trip);
    setIfDefined(record, 'currentStopSequence', vehicle.currentStopSequence);
    setIfDefined(record, 'currentStatus', vehicle.currentStatus);
    setIfDefined(record, 'timestamp', vehicle.timestamp);

    const position = vehicle.position;
    if (position) {
        setIfDefined(record, 'latitude', position.latitude);
        setIfDefined(record, 'longitude', position.longitude);
        setIfDefined(record, 'bearing', position.bearing);
        setIfDefined(record, 'speed', position.speed);
    }
    return record;
}

/**
 * Decodes a GTFS-RT FeedMessage into typed records for the given feed kind.
 *
 * An unreadable envelope or header fails the whole message; an entity that does not
 * decode is skipped and counted in `skippedEntities`.
 */
export function parseRealtime(bytes: Uint8Array, feedKind: string): RealtimeParseResult {
    if (!isRealtimeKind(feedKind)) {
        return { ok: false, failure: { kind: 'unsupported_kind', message: `Unsupported real-time feed kind: ${feedKind}` } };
    }

    let envelope: { header: FeedHeaderObject; entities: Uint8Array[] };
    try {
        envelope = readEnvelope(bytes);
    } catch (error) {
        return { ok: false, failure: { kind: 'decode', message: `Malformed FeedMessage: ${describeError(error)}` } };
    }

    const records: RealtimeRecord[] = [];
    let skippedEntities = 0;
    for (const entityBytes of envelope.entities) {
        let entity: FeedEntityObject;
        try {
            entity = FeedEntityType.toObject(FeedEntityType.decode(entityBytes), CONVERSION);
        } catch {
            skippedEntities++;
            continue;
        }

        const record = feedKind === 'trip_updates' ? toTripUpdateRecord(entity) : toVehiclePositionRecord(entity);
        if (record) {
            records.push(record);
        }
    }

    const message: ParsedRealtimeMessage = {
        feedType: feedKind,
        version: envelope.header.gtfsRealtimeVersion ?? '',
        records,
    };
    setIfDefined(message, 'headerTimestamp', envelope.header.timestamp);
    return { ok: true, message, skippedEntities };
}

/**
 * Guesses the operating agency from the first record that carries a vehicle id. Ids
 * such as `toyama_tram-5007` yield their first two segments (`toyama_tram`); an id with
 * a single segment is returned whole.
 */
export function inferAgency(records: RealtimeRecord[]): string | undefined {
    const vehicleId = records.find((record) => record.vehicleId)?.vehicleId;
    if (!vehicleId) return undefined;

    const parts = vehicleId.replace(/[-.]/g, '_').split('_');
    return parts.length >= 2 ? parts.slice(0, 2).join('_') : parts[0];
}
