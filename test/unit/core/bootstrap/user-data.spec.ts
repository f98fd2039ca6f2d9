import * as assert from 'assert'
import { encodeUserData, renderMainUserData, renderWorkerUserData } from '../../../../src/core/bootstrap/user-data'

describe('Node user data', () => {

    const main = renderMainUserData({
        kubernetesVersion: 'v1.34',
        calicoVersion: 'v3.30.0',
        podCidr: '10.200.0.0/16',
        serviceCidr: '10.201.0.0/16',
    })

    const worker = renderWorkerUserData({
        kubernetesVersion: 'v1.34',
        nvidiaDriverVersion: '570',
    })

    it('should start with a bash shebang failing on errors', () => {
        assert.ok(main.startsWith('#!/bin/bash -eux\n'))
        assert.ok(worker.startsWith('#!/bin/bash -eux\n'))
    })

    it('should set versions and network ranges of main node', () => {
        const lines = main.split('\n')
        assert.ok(lines.includes('KUBE_VERSION="v1.34"'))
        assert.ok(lines.includes('CALICO_VERSION="v3.30.0"'))
        assert.ok(lines.includes('POD_CIDR="10.200.0.0/16"'))
        assert.ok(lines.includes('SERVICE_CIDR="10.201.0.0/16"'))
        assert.ok(lines.includes('kubeadm init --pod-network-cidr=$POD_CIDR --service-cidr=$SERVICE_CIDR --apiserver-cert-extra-sans=$PUBLIC_IP'))
    })

    it('should configure containerd with systemd cgroups on every node', () => {
        const sedLine = "sed -i 's/SystemdCgroup = false/SystemdCgroup = true/' /etc/containerd/config.toml"
        assert.ok(main.split('\n').includes(sedLine))
        assert.ok(worker.split('\n').includes(sedLine))
    })

    it('should install NVIDIA stack only on workers', () => {
        const lines = worker.split('\n')
        assert.ok(lines.includes('NVIDIA_DRIVER_VERSION="570"'))
        assert.ok(lines.includes('if lspci | grep -i nvidia; then'))
        assert.ok(lines.includes('    nvidia-ctk runtime configure --runtime=containerd --nvidia-set-as-default'))
        assert.strictEqual(main.includes('nvidia'), false)
        assert.strictEqual(worker.includes('kubeadm init'), false)
    })

    it('should encode user data as base64', () => {
        assert.strictEqual(encodeUserData('#!/bin/bash\n'), 'IyEvYmluL2Jhc2gK')
    })
})
