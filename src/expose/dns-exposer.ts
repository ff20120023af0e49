import { z } from "zod";
import type { IAwsCli } from "../aws/aws-cli.js";
import type { DeployConfig } from "../config/index.js";
import { logger } from "../config/logger.js";

const listCertificatesSchema = z.object({
  CertificateSummaryList: z.array(
    z.object({
      CertificateArn: z.string(),
      DomainName: z.string(),
      Status: z.string().optional(),
    }),
  ),
});

const requestCertificateSchema = z.object({
  CertificateArn: z.string(),
});

const describeCertificateSchema = z.object({
  Certificate: z.object({
    CertificateArn: z.string(),
    Status: z.string(),
    DomainValidationOptions: z
      .array(
        z.object({
          DomainName: z.string(),
          ResourceRecord: z
            .object({
              Name: z.string(),
              Type: z.string(),
              Value: z.string(),
            })
            .optional(),
        }),
      )
      .default([]),
  }),
});

const describeLoadBalancersSchema = z.object({
  LoadBalancers: z
    .array(
      z.object({
        DNSName: z.string(),
        CanonicalHostedZoneId: z.string(),
      }),
    )
    .nonempty(),
});

const describeListenersSchema = z.object({
  Listeners: z.array(
    z.object({
      ListenerArn: z.string(),
      Port: z.number(),
      Protocol: z.string(),
    }),
  ),
});

export interface ExposeResult {
  certificateArn: string;
  loadBalancerDnsName: string;
  /** True when an HTTPS listener was added to the load balancer. */
  listenerCreated: boolean;
}

interface ResourceRecordSet {
  Name: string;
  Type: string;
  TTL?: number;
  ResourceRecords?: Array<{ Value: string }>;
  AliasTarget?: { HostedZoneId: string; DNSName: string; EvaluateTargetHealth: boolean };
}

/** Change batch for `route53 change-resource-record-sets`. */
export function upsertBatch(comment: string, record: ResourceRecordSet): string {
  return JSON.stringify({ Comment: comment, Changes: [{ Action: "UPSERT", ResourceRecordSet: record }] });
}

/**
 * Binds the domain to the load balancer: an ACM certificate validated over
 * DNS, an HTTPS listener, and an alias record pointing at the balancer.
 */
export class DnsExposer {
  constructor(private readonly aws: IAwsCli) {}

  async expose(config: DeployConfig): Promise<ExposeResult> {
    const domain = config.app.domainName;
    const certificateArn = await this.ensureCertificate(config);

    const lbs = await this.aws.run(
      ["elbv2", "describe-load-balancers", "--load-balancer-arns", config.loadBalancer.arn],
      describeLoadBalancersSchema,
    );
    const { DNSName, CanonicalHostedZoneId } = lbs.LoadBalancers[0];

    const listenerCreated = await this.ensureHttpsListener(config, certificateArn);

    await this.aws.exec([
      "route53",
      "change-resource-record-sets",
      "--hosted-zone-id",
      config.dns.hostedZoneId,
      "--change-batch",
      upsertBatch(`Alias ${domain} to load balancer`, {
        Name: domain,
        Type: "A",
        AliasTarget: { HostedZoneId: CanonicalHostedZoneId, DNSName, EvaluateTargetHealth: true },
      }),
    ]);
    logger.info(`${domain} now points at ${DNSName}`);

    return { certificateArn, loadBalancerDnsName: DNSName, listenerCreated };
  }

  private async ensureCertificate(config: DeployConfig): Promise<string> {
    const domain = config.app.domainName;
    const listed = await this.aws.run(
      ["acm", "list-certificates", "--certificate-statuses", "ISSUED", "PENDING_VALIDATION"],
      listCertificatesSchema,
    );

    let arn = listed.CertificateSummaryList.find((c) => c.DomainName === domain)?.CertificateArn;
    if (arn) {
      logger.info(`Reusing certificate ${arn} for ${domain}`);
    } else {
      const requested = await this.aws.run(
        ["acm", "request-certificate", "--domain-name", domain, "--validation-method", "DNS"],
        requestCertificateSchema,
      );
      arn = requested.CertificateArn;
      logger.info(`Requested certificate ${arn} for ${domain}`);
    }

    const described = await this.aws.run(
      ["acm", "describe-certificate", "--certificate-arn", arn],
      describeCertificateSchema,
    );
    if (described.Certificate.Status === "ISSUED") return arn;

    const record = described.Certificate.DomainValidationOptions.find((o) => o.DomainName === domain)?.ResourceRecord;
    if (!record) {
      throw new Error(`Validation record for ${domain} is not published yet; re-run the expose step`);
    }

    await this.aws.exec([
      "route53",
      "change-resource-record-sets",
      "--hosted-zone-id",
      config.dns.hostedZoneId,
      "--change-batch",
      upsertBatch(`ACM validation for ${domain}`, {
        Name: record.Name,
        Type: record.Type,
        TTL: 300,
        ResourceRecords: [{ Value: record.Value }],
      }),
    ]);

    logger.info(`Waiting for ${arn} to be validated`);
    await this.aws.exec(["acm", "wait", "certificate-validated", "--certificate-arn", arn]);
    return arn;
  }

  private async ensureHttpsListener(config: DeployConfig, certificateArn: string): Promise<boolean> {
    const listeners = await this.aws.run(
      ["elbv2", "describe-listeners", "--load-balancer-arn", config.loadBalancer.arn],
      describeListenersSchema,
    );
    if (listeners.Listeners.some((l) => l.Protocol === "HTTPS" && l.Port === 443)) {
      return false;
    }

    await this.aws.exec([
      "elbv2",
      "create-listener",
      "--load-balancer-arn",
      config.loadBalancer.arn,
      "--protocol",
      "HTTPS",
      "--port",
      "443",
      "--certificates",
      `CertificateArn=${certificateArn}`,
      "--default-actions",
      `Type=forward,TargetGroupArn=${config.loadBalancer.targetGroupArn}`,
    ]);
    logger.info("Added HTTPS listener on port 443");
    return true;
  }
}
