import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom, Observable } from 'rxjs';
import { AxiosError, AxiosRequestConfig, AxiosResponse } from 'axios';
import { DataVaultConfiguration, EncryptedDocument, IndexQuery, VaultGateway } from '../interfaces';
import {
  VAULT_NOT_FOUND_MESSAGE,
  VaultAlreadyExistsError,
  VaultDocumentNotFoundError,
  VaultNotFoundError,
  VaultRequestError,
} from '../vault.errors';
import { documentIdFromLocation, documentLocation } from '../utils/document-id';
import { DEFAULT_EDV_REQUEST_TIMEOUT } from '../../config/config.constants';
import { getErrorMessage } from '../../shared/error.utils';

/**
 * Which resource a request addressed, used to classify a 404.
 */
interface RequestTarget {
  vaultId: string;
  documentId?: string;
}

function isEncryptedDocument(value: unknown): value is EncryptedDocument {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'jwe' in value &&
    typeof value.jwe === 'string' &&
    'sequence' in value &&
    typeof value.sequence === 'number' &&
    'indexedAttributeCollections' in value &&
    Array.isArray(value.indexedAttributeCollections)
  );
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

/**
 * {@link VaultGateway} backed by a remote encrypted data vault server.
 *
 * Endpoints:
 * - `POST /data-vaults`
 * - `POST /encrypted-data-vaults/:vaultId/documents`
 * - `GET  /encrypted-data-vaults/:vaultId/documents/:docId`
 * - `POST /encrypted-data-vaults/:vaultId/queries`
 *
 * Every request is bounded by `VCS_EDV_REQUEST_TIMEOUT`. The gateway never retries.
 */
@Injectable()
export class EdvHttpGateway implements VaultGateway {
  private readonly logger = new Logger(EdvHttpGateway.name);
  private readonly baseUrl: string;
  private readonly timeout: number;

  /* v8 ignore next 4 - false positive on constructor parameter properties */
  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    const baseUrl = this.configService.get<string>('vcs.vault.edvUrl');
    if (!baseUrl) {
      throw new Error('EDV URL not configured (vcs.vault.edvUrl)');
    }
    this.baseUrl = baseUrl;
    this.timeout = this.configService.get<number>('vcs.vault.timeout') ?? DEFAULT_EDV_REQUEST_TIMEOUT;
  }

  async createDataVault(config: DataVaultConfiguration): Promise<string> {
    const response = await this.send('creating data vault', { vaultId: config.referenceId }, (requestConfig) =>
      this.httpService.post<unknown>(`${this.baseUrl}/data-vaults`, config, requestConfig),
    );

    const location = this.locationHeader(response);
    const vaultId = location ? documentIdFromLocation(location) : config.referenceId;
    this.logger.log(`Vault created: ${vaultId}`);
    return vaultId;
  }

  async createDocument(vaultId: string, document: EncryptedDocument): Promise<string> {
    const response = await this.send('creating document', { vaultId }, (requestConfig) =>
      this.httpService.post<unknown>(`${this.vaultUrl(vaultId)}/documents`, document, requestConfig),
    );

    return this.locationHeader(response) ?? documentLocation(vaultId, document.id);
  }

  async readDocument(vaultId: string, documentId: string): Promise<EncryptedDocument> {
    const response = await this.send('reading document', { vaultId, documentId }, (requestConfig) =>
      this.httpService.get<unknown>(`${this.vaultUrl(vaultId)}/documents/${encodeURIComponent(documentId)}`, requestConfig),
    );

    if (!isEncryptedDocument(response.data)) {
      throw new VaultRequestError(`EDV returned a malformed document for ${vaultId}/${documentId}`, response.status);
    }
    return response.data;
  }

  async queryVault(vaultId: string, query: IndexQuery): Promise<string[]> {
    const response = await this.send('querying vault', { vaultId }, (requestConfig) =>
      this.httpService.post<unknown>(`${this.vaultUrl(vaultId)}/queries`, query, requestConfig),
    );

    if (!isStringArray(response.data)) {
      throw new VaultRequestError(`EDV returned a malformed query result for vault ${vaultId}`, response.status);
    }
    return response.data;
  }

  private vaultUrl(vaultId: string): string {
    return `${this.baseUrl}/encrypted-data-vaults/${encodeURIComponent(vaultId)}`;
  }

  private async send<T>(
    operation: string,
    target: RequestTarget,
    request: (requestConfig: AxiosRequestConfig) => Observable<AxiosResponse<T>>,
  ): Promise<AxiosResponse<T>> {
    try {
      return await firstValueFrom(
        request({
          headers: { 'Content-Type': 'application/json' },
          timeout: this.timeout,
        }),
      );
    } catch (error) {
      throw this.toVaultError(operation, target, error);
    }
  }

  private locationHeader(response: AxiosResponse<unknown>): string | undefined {
    const location: unknown = response.headers['location'];
    return typeof location === 'string' && location.length > 0 ? location : undefined;
  }

  /**
   * Map a failed request onto the vault error taxonomy.
   */
  private toVaultError(operation: string, target: RequestTarget, error: unknown): Error {
    if (!(error instanceof AxiosError)) {
      return new VaultRequestError(`EDV request failed while ${operation}: ${getErrorMessage(error)}`, undefined, error);
    }

    const status = error.response?.status;
    const data: unknown = error.response?.data;
    const body = typeof data === 'string' ? data : JSON.stringify(data ?? '');

    if (body.includes(VAULT_NOT_FOUND_MESSAGE)) {
      return new VaultNotFoundError(target.vaultId);
    }
    if (status === 404) {
      return target.documentId
        ? new VaultDocumentNotFoundError(target.vaultId, target.documentId)
        : new VaultNotFoundError(target.vaultId);
    }
    if (status === 409 && operation === 'creating data vault') {
      return new VaultAlreadyExistsError(target.vaultId);
    }

    this.logger.error(`EDV request failed while ${operation}: ${error.message} ${JSON.stringify({ status, data: body })}`);
    return new VaultRequestError(`EDV request failed while ${operation}: ${error.message}`, status, error);
  }
}
