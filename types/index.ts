export interface UploadedFileRecord {
  filename: string;
  url: string;
  size: number;  // in bytes
}

export interface WelcomeResponse {
  message: string;
}

export interface DeleteResponse {
  message: string;
}

export interface ErrorResponse {
  detail: string;
}
