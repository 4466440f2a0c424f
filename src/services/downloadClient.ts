import axios from 'axios';
import { z } from 'zod';
import logger from '../config/logger';
import type { DownloadClient } from '../models/DownloadClient';
import { errorMessage } from '../utils/errors';
import { infoHashFromMagnet } from '../utils/magnet';

export interface AddDownloadResult {
  success: boolean;
  message: string;
  downloadId?: string;
}

/**
 * The two calls the decision engine makes against download clients.
 */
export interface DownloadGateway {
  addDownload(client: DownloadClient, url: string, category: string, title: string, infoHash?: string): Promise<AddDownloadResult>;
  cancelDownload(client: DownloadClient, downloadId: string, deleteFiles: boolean): Promise<boolean>;
}

interface QbResponse {
  success: boolean;
  data?: unknown;
  error?: string;
  status?: number;
}

const REQUEST_TIMEOUT_MS = 30000;

const sabAddSchema = z.object({
  status: z.boolean().optional(),
  nzo_ids: z.array(z.string()).optional(),
  error: z.string().optional()
});

const sabStatusSchema = z.object({
  status: z.boolean().optional(),
  error: z.string().optional()
});

// qBittorrent session cookies per client (clientId -> SID cookie value)
const qbSessions: Map<string, string> = new Map();

function baseUrl(client: DownloadClient): string {
  const protocol = client.use_ssl ? 'https' : 'http';
  const base = client.url_base ? `/${client.url_base.replace(/^\//, '')}` : '';
  return `${protocol}://${client.host}:${client.port}${base}`;
}

export class DownloadClientService implements DownloadGateway {
  async addDownload(client: DownloadClient, url: string, category: string, title: string, infoHash?: string): Promise<AddDownloadResult> {
    logger.info(`[DownloadClient] Sending "${title}" to ${client.type} client "${client.name}"`);
    switch (client.type) {
      case 'qbittorrent':
        return this.addToQBittorrent(client, url, category, infoHash);
      case 'sabnzbd':
        return this.addToSABnzbd(client, url, category, title);
    }
  }

  async cancelDownload(client: DownloadClient, downloadId: string, deleteFiles: boolean): Promise<boolean> {
    switch (client.type) {
      case 'qbittorrent':
        return this.removeFromQBittorrent(client, downloadId, deleteFiles);
      case 'sabnzbd':
        return this.removeFromSABnzbd(client, downloadId, deleteFiles);
    }
  }

  // ==================== qBittorrent ====================

  private async qbLogin(client: DownloadClient): Promise<{ success: boolean; cookie?: string; error?: string }> {
    const url = baseUrl(client);

    try {
      const response = await axios({
        method: 'POST',
        url: `${url}/api/v2/auth/login`,
        data: `username=${encodeURIComponent(client.username || '')}&password=${encodeURIComponent(client.password || '')}`,
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'Referer': url + '/'
        },
        timeout: REQUEST_TIMEOUT_MS,
        validateStatus: () => true,
        maxRedirects: 0
      });

      if (response.status === 403) {
        return { success: false, error: 'Access denied (403). Check qBittorrent Web UI is enabled and accessible.' };
      }
      if (response.status >= 400) {
        return { success: false, error: `Login failed with status ${response.status}` };
      }
      if (response.data === 'Fails.') {
        return { success: false, error: 'Invalid username or password' };
      }

      const setCookie: unknown = response.headers['set-cookie'];
      const first = Array.isArray(setCookie) ? setCookie[0] : undefined;
      const sid = typeof first === 'string' ? first.match(/SID=([^;]+)/) : null;
      if (sid) {
        return { success: true, cookie: `SID=${sid[1]}` };
      }

      logger.warn(`[qBittorrent] ${client.name}: Login OK but no SID cookie received`);
      return { success: true, cookie: '' };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }

  private async qbRequest(
    client: DownloadClient,
    endpoint: string,
    data: string,
    retryOnAuthFail: boolean = true
  ): Promise<QbResponse> {
    const url = baseUrl(client);

    let cookie = qbSessions.get(client.id);
    if (cookie === undefined) {
      const login = await this.qbLogin(client);
      if (!login.success) {
        return { success: false, error: login.error };
      }
      cookie = login.cookie || '';
      qbSessions.set(client.id, cookie);
    }

    try {
      const response = await axios({
        method: 'POST',
        url: `${url}${endpoint}`,
        data,
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'Cookie': cookie,
          'Referer': url + '/'
        },
        timeout: REQUEST_TIMEOUT_MS,
        validateStatus: () => true
      });

      // Session may have expired
      if (response.status === 403 && retryOnAuthFail) {
        logger.debug(`[qBittorrent] ${client.name}: Got 403, refreshing session...`);
        qbSessions.delete(client.id);
        return this.qbRequest(client, endpoint, data, false);
      }

      if (response.status >= 400) {
        return { success: false, error: `Request failed with status ${response.status}`, status: response.status };
      }

      return { success: true, data: response.data, status: response.status };
    } catch (error) {
      logger.error(`[qBittorrent] ${client.name}: Request to ${endpoint} failed: ${errorMessage(error)}`);
      return { success: false, error: errorMessage(error) };
    }
  }

  private async addToQBittorrent(client: DownloadClient, url: string, category: string, infoHash?: string): Promise<AddDownloadResult> {
    const params = new URLSearchParams();
    params.append('urls', url);
    if (category) {
      params.append('category', category);
    }

    const result = await this.qbRequest(client, '/api/v2/torrents/add', params.toString());
    if (!result.success) {
      return { success: false, message: result.error || 'Failed to add torrent' };
    }
    if (result.data === 'Fails.') {
      return { success: false, message: 'qBittorrent rejected the torrent' };
    }

    // qBittorrent does not return an id; torrents are addressed by info hash
    const downloadId = infoHash?.toLowerCase() ?? infoHashFromMagnet(url);
    if (!downloadId) {
      logger.warn(`[qBittorrent] ${client.name}: No info hash known for ${url}, it cannot be removed later`);
    }
    return { success: true, message: 'Torrent added successfully', downloadId };
  }

  private async removeFromQBittorrent(client: DownloadClient, hash: string, deleteFiles: boolean): Promise<boolean> {
    const params = new URLSearchParams();
    params.append('hashes', hash);
    params.append('deleteFiles', deleteFiles ? 'true' : 'false');

    const result = await this.qbRequest(client, '/api/v2/torrents/delete', params.toString());
    if (!result.success) {
      logger.warn(`[qBittorrent] ${client.name}: Failed to remove ${hash}: ${result.error}`);
    }
    return result.success;
  }

  // ==================== SABnzbd ====================

  private async addToSABnzbd(client: DownloadClient, url: string, category: string, title: string): Promise<AddDownloadResult> {
    const params: Record<string, string> = {
      mode: 'addurl',
      name: url,
      nzbname: title,
      apikey: client.api_key || '',
      output: 'json'
    };
    if (category) {
      params.cat = category;
    }

    try {
      const response = await axios.get<unknown>(`${baseUrl(client)}/api`, { params, timeout: REQUEST_TIMEOUT_MS });
      const body = sabAddSchema.safeParse(response.data);

      if (body.success && (body.data.status === true || (body.data.nzo_ids?.length ?? 0) > 0)) {
        const nzoId = body.data.nzo_ids?.[0];
        logger.info(`[SABnzbd] NZB added via URL (nzo_id: ${nzoId ?? 'unknown'})`);
        return { success: true, message: 'NZB added to SABnzbd', downloadId: nzoId };
      }

      const errorMsg = (body.success ? body.data.error : undefined) || 'SABnzbd did not accept the NZB';
      logger.error(`[SABnzbd] Failed: ${errorMsg}`);
      return { success: false, message: errorMsg };
    } catch (error) {
      logger.error(`[SABnzbd] Error adding NZB: ${errorMessage(error)}`);
      return { success: false, message: errorMessage(error) };
    }
  }

  private async removeFromSABnzbd(client: DownloadClient, nzoId: string, deleteFiles: boolean): Promise<boolean> {
    try {
      const response = await axios.get<unknown>(`${baseUrl(client)}/api`, {
        params: {
          mode: 'queue',
          name: 'delete',
          value: nzoId,
          del_files: deleteFiles ? 1 : 0,
          apikey: client.api_key || '',
          output: 'json'
        },
        timeout: REQUEST_TIMEOUT_MS
      });
      const body = sabStatusSchema.safeParse(response.data);
      return body.success && body.data.status === true;
    } catch (error) {
      logger.warn(`[SABnzbd] Failed to remove ${nzoId}: ${errorMessage(error)}`);
      return false;
    }
  }
}

export const downloadClientService = new DownloadClientService();
