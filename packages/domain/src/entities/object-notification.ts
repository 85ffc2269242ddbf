export interface ObjectNotificationRecord {
  readonly s3: {
    readonly bucket: { readonly name: string };
    readonly object: { readonly key: string; readonly size?: number };
  };
}

/** Object-created notifications, as delivered by the upload bucket. */
export interface ObjectNotificationEvent {
  readonly Records: ObjectNotificationRecord[];
}
