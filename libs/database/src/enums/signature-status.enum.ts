export enum SignatureStatus {
  PENDING = 'PENDING',
  INVITED = 'INVITED',
  SIGNED = 'SIGNED',
}
