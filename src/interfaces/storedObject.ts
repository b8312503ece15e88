export interface StoredObject {
    key: string;
    uri: string;
}
