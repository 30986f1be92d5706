export interface TransferConfig {
  cloudRoot: string | null;            // Folder standing in for the provider's container root
  containerIdentifier: string | null;  // null selects the default container
  accountIdentity: string | null;      // Reported as the store's identity token
  indexFilename: string;               // Index document inside Documents
  watchContainer: boolean;             // Emit remote changes under Documents
  debug: boolean;
}

export * from './sync';
