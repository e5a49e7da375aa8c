/**
 * File backup store
 *
 * Writes instance backups and restore reports as JSON files under the
 * configured backup directory:
 *
 *   instance_<instance-id>_<YYYYMMDD_HHMMSS>.json
 *   restore_report_<instance-id>_<YYYYMMDD_HHMMSS>.json
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import {
  deepFreeze,
  INSTANCE_STATES,
  toReportDocument,
  type BackupRecord,
  type BackupStore,
  type RestoreReport,
} from '@ec2-restore/core';

const InstanceSchema = z.object({
  instanceId: z.string(),
  state: z.enum(INSTANCE_STATES),
  instanceType: z.string(),
  placement: z.object({
    availabilityZone: z.string(),
    tenancy: z.string().optional(),
    groupName: z.string().optional(),
  }),
  networkInterfaces: z.array(z.object({
    networkInterfaceId: z.string(),
    attachmentId: z.string(),
    deviceIndex: z.number(),
    subnetId: z.string().optional(),
    securityGroupIds: z.array(z.string()),
    privateIpAddress: z.string().optional(),
    deleteOnTermination: z.boolean(),
  })),
  blockDeviceMappings: z.array(z.object({
    deviceName: z.string(),
    volumeId: z.string(),
    deleteOnTermination: z.boolean(),
  })),
  tags: z.array(z.object({ key: z.string(), value: z.string() })),
  keyName: z.string().optional(),
  iamInstanceProfile: z.object({ arn: z.string().optional(), name: z.string().optional() }).optional(),
  userData: z.string().optional(),
  ownerId: z.string().optional(),
  launchTime: z.string().optional(),
});

const BackupFileSchema = z.object({
  InstanceId: z.string(),
  InstanceName: z.string().nullable(),
  InstanceDetails: InstanceSchema,
  CapturedAt: z.string(),
});

export type BackupFile = z.infer<typeof BackupFileSchema>;

/**
 * `YYYYMMDD_HHMMSS` in UTC
 */
export function fileTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export class FileBackupStore implements BackupStore {
  constructor(private readonly directory: string) {}

  async save(record: BackupRecord): Promise<string> {
    const file: BackupFile = {
      InstanceId: record.instanceId,
      InstanceName: record.instanceName,
      InstanceDetails: record.instance,
      CapturedAt: record.capturedAt,
    };
    const name = `instance_${record.instanceId}_${fileTimestamp(new Date(record.capturedAt))}.json`;
    return this.write(name, file);
  }

  async load(location: string): Promise<BackupRecord> {
    const content = await fs.readFile(location, 'utf-8');
    const parsed = BackupFileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new Error(`Invalid backup file ${location}: ${issues}`);
    }
    const file = parsed.data;
    return deepFreeze({
      instanceId: file.InstanceId,
      instanceName: file.InstanceName,
      instance: file.InstanceDetails,
      capturedAt: file.CapturedAt,
    });
  }

  async writeReport(report: RestoreReport): Promise<string> {
    const name = `restore_report_${report.instanceId}_${fileTimestamp(new Date(report.timestamp))}.json`;
    return this.write(name, toReportDocument(report));
  }

  private async write(name: string, content: unknown): Promise<string> {
    await fs.mkdir(this.directory, { recursive: true });
    const location = path.join(this.directory, name);
    await fs.writeFile(location, `${JSON.stringify(content, null, 2)}\n`, 'utf-8');
    return location;
  }
}
