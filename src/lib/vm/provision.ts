import { networkInterfaces } from 'node:os'

export const MACHINE_NAME = 'vmspace'
export const DEFAULT_USER = 'dev'
export const DEFAULT_SUBNET = 123

const GIB = 1073741824

export function getDebianCloudImageUrl(): string {
  const arch = process.arch === 'arm64' ? 'arm64' : 'amd64'
  return `https://cloud.debian.org/images/cloud/bookworm/latest/debian-12-genericcloud-${arch}.qcow2`
}

/**
 * Pick the third octet of the VM network. When the host itself sits on a
 * 192.168.X.0/24 network (e.g. it is a VM too), the guest network must not
 * collide with it.
 */
export function detectNetworkSubnet(
  interfaces: ReturnType<typeof networkInterfaces> = networkInterfaces(),
): number {
  for (const entries of Object.values(interfaces)) {
    for (const entry of entries ?? []) {
      if (entry.family !== 'IPv4' || entry.internal) continue
      const match = entry.address.match(/^192\.168\.(\d+)\.\d+$/)
      if (!match) continue
      const octet = Number(match[1])
      if (octet === 122 || octet === 123) return 200
      return (octet + 1) % 256
    }
  }
  return DEFAULT_SUBNET
}

const CREDENTIALS_GUEST_PATH =
  '/home/${var.default_user}/.config/gcloud/application_default_credentials.json'

const credentialFiles = [
  '[for c in compact([var.credentials_b64]) : {',
  `path = "${CREDENTIALS_GUEST_PATH}",`,
  'encoding = "b64", content = c,',
  'owner = "${var.default_user}:${var.default_user}",',
  'permissions = "0600", defer = true }]',
].join(' ')

const vertexEnv = [
  'export CLAUDE_CODE_USE_VERTEX=1',
  'export ANTHROPIC_VERTEX_PROJECT_ID=${p}',
  'export CLOUD_ML_REGION=${var.vertex_region}',
  `export GOOGLE_APPLICATION_CREDENTIALS=${CREDENTIALS_GUEST_PATH}`,
].join('\\n')

const vertexFiles = [
  '[for p in compact([var.vertex_project_id]) : {',
  'path = "/etc/profile.d/vmspace-vertex.sh", permissions = "0644",',
  `content = "${vertexEnv}\\n" }]`,
].join(' ')

/**
 * Terraform configuration (JSON syntax) for the single libvirt VM. Resource
 * sizes come in as variables; the outputs report what was actually created so
 * later applies can replay the original values.
 */
export function buildTerraformConfig(): Record<string, unknown> {
  return {
    terraform: {
      required_providers: {
        libvirt: { source: 'dmacvicar/libvirt', version: '~> 0.7.6' },
        tls: { source: 'hashicorp/tls', version: '~> 4.0' },
        local: { source: 'hashicorp/local', version: '~> 2.5' },
      },
    },
    provider: {
      libvirt: { uri: 'qemu:///system' },
    },
    variable: {
      machine_name: { type: 'string', default: MACHINE_NAME },
      default_user: { type: 'string', default: DEFAULT_USER },
      base_image_url: { type: 'string', default: getDebianCloudImageUrl() },
      memory_mb: { type: 'number', default: 4096 },
      vcpus: { type: 'number', default: 2 },
      disk_gb: { type: 'number', default: 20 },
      network_subnet_third_octet: { type: 'number', default: DEFAULT_SUBNET },
      user_uid: { type: 'number', default: 1000 },
      credentials_b64: { type: 'string', default: '', sensitive: true },
      vertex_project_id: { type: 'string', default: '' },
      vertex_region: { type: 'string', default: 'us-central1' },
    },
    locals: {
      cloud_config: {
        users: [
          'default',
          {
            name: '${var.default_user}',
            uid: '${var.user_uid}',
            shell: '/bin/bash',
            sudo: 'ALL=(ALL) NOPASSWD:ALL',
            ssh_authorized_keys: [
              '${trimspace(tls_private_key.ssh.public_key_openssh)}',
            ],
          },
        ],
        package_update: true,
        packages: ['git', 'openssh-server'],
        write_files: `\${concat(${credentialFiles}, ${vertexFiles})}`,
        runcmd: [
          [
            'install',
            '-d',
            '-o',
            '${var.default_user}',
            '-g',
            '${var.default_user}',
            '/home/${var.default_user}/workspace',
          ],
        ],
      },
    },
    resource: {
      tls_private_key: {
        ssh: { algorithm: 'ED25519' },
      },
      local_sensitive_file: {
        ssh_key: {
          content: '${tls_private_key.ssh.private_key_openssh}',
          filename: '${path.module}/vm-ssh-key',
          file_permission: '0600',
        },
      },
      libvirt_network: {
        net: {
          name: '${var.machine_name}-net',
          mode: 'nat',
          addresses: ['192.168.${var.network_subnet_third_octet}.0/24'],
          dhcp: { enabled: true },
        },
      },
      libvirt_volume: {
        base: {
          name: '${var.machine_name}-base.qcow2',
          source: '${var.base_image_url}',
          format: 'qcow2',
        },
        root: {
          name: '${var.machine_name}-root.qcow2',
          base_volume_id: '${libvirt_volume.base.id}',
          size: `\${var.disk_gb * ${GIB}}`,
        },
      },
      libvirt_cloudinit_disk: {
        init: {
          name: '${var.machine_name}-init.iso',
          user_data: '#cloud-config\n${yamlencode(local.cloud_config)}',
          lifecycle: { ignore_changes: ['user_data'] },
        },
      },
      libvirt_domain: {
        vm: {
          name: '${var.machine_name}',
          memory: '${var.memory_mb}',
          vcpu: '${var.vcpus}',
          running: true,
          cloudinit: '${libvirt_cloudinit_disk.init.id}',
          disk: [{ volume_id: '${libvirt_volume.root.id}' }],
          network_interface: [
            {
              network_id: '${libvirt_network.net.id}',
              wait_for_lease: true,
            },
          ],
          console: [
            { type: 'pty', target_port: '0', target_type: 'serial' },
          ],
        },
      },
    },
    output: {
      vm_ip: {
        value:
          '${try(libvirt_domain.vm.network_interface[0].addresses[0], "IP not yet assigned")}',
      },
      default_user: { value: '${var.default_user}' },
      ssh_key_path: { value: '${abspath(local_sensitive_file.ssh_key.filename)}' },
      workspace_root: { value: '/home/${var.default_user}/workspace' },
      memory_mb: { value: '${libvirt_domain.vm.memory}' },
      vcpus: { value: '${libvirt_domain.vm.vcpu}' },
      disk_gb: { value: `\${floor(libvirt_volume.root.size / ${GIB})}` },
      network_subnet_third_octet: {
        value: '${var.network_subnet_third_octet}',
      },
    },
  }
}
