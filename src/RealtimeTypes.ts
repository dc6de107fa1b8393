// Plain-object shapes produced by protobufjs toObject() for transit_realtime messages.
// Keys are camelCase, uint64 fields arrive as numbers and enums as their names.
// Every field is optional: toObject() only emits fields the message actually set.

export interface FeedHeaderObject {
    gtfsRealtimeVersion?: string;
    incrementality?: string;
    timestamp?: number;
    feedVersion?: string;
}

export interface TripDescriptorObject {
    tripId?: string;
    routeId?: string;
    directionId?: number;
    startTime?: string;
    startDate?: string;
    scheduleRelationship?: string;
}

export interface VehicleDescriptorObject {
    id?: string;
    label?: string;
    licensePlate?: string;
}

export interface StopTimeEventObject {
    delay?: number;
    time?: number;
    uncertainty?: number;
}

export interface StopTimeUpdateObject {
    stopSequence?: number;
    stopId?: string;
    arrival?: StopTimeEventObject;
    departure?: StopTimeEventObject;
    scheduleRelationship?: string;
}

export interface TripUpdateObject {
    trip?: TripDescriptorObject;
    vehicle?: VehicleDescriptorObject;
    stopTimeUpdate?: StopTimeUpdateObject[];
    timestamp?: number;
    delay?: number;
}

export interface PositionObject {
    latitude?: number;
    longitude?: number;
    bearing?: number;
    odometer?: number;
    speed?: number;
}

export interface VehiclePositionObject {
    trip?: TripDescriptorObject;
    vehicle?: VehicleDescriptorObject;
    position?: PositionObject;
    currentStopSequence?: number;
    stopId?: string;
    currentStatus?: string;
    timestamp?: number;
}

export interface FeedEntityObject {
    id?: string;
    isDeleted?: boolean;
    tripUpdate?: TripUpdateObject;
    vehicle?: VehiclePositionObject;
}
