/**
 * cloud-init user data run at first boot of cluster nodes.
 *
 * Every node gets containerd and kubeadm/kubelet/kubectl. The main node then runs kubeadm init
 * with its public address in the API server certificate and installs Calico. Workers install the
 * NVIDIA driver and container toolkit when a NVIDIA device is present, they join later over SSH.
 */

export interface MainUserDataArgs {
    kubernetesVersion: string
    calicoVersion: string
    podCidr: string
    serviceCidr: string
}

export interface WorkerUserDataArgs {
    kubernetesVersion: string
    nvidiaDriverVersion: string
}

const SCRIPT_HEADER = `#!/bin/bash -eux
export DEBIAN_FRONTEND=noninteractive
apt-get update
`

const KERNEL_SETUP = `
swapoff -a

modprobe overlay
modprobe br_netfilter

tee /etc/modules-load.d/k8s.conf <<EOF
overlay
br_netfilter
EOF

tee /etc/sysctl.d/k8s.conf <<EOF
net.bridge.bridge-nf-call-iptables  = 1
net.bridge.bridge-nf-call-ip6tables = 1
net.ipv4.ip_forward                 = 1
EOF

sysctl --system

apt -y install curl gnupg apt-transport-https ca-certificates software-properties-common
`

const CONTAINERD_SETUP = `
# containerd with systemd cgroup driver
curl -fsSL https://download.docker.com/linux/ubuntu/gpg | gpg --dearmor -o /usr/share/keyrings/docker-archive-keyring.gpg
tee /etc/apt/sources.list.d/docker.list <<EOF
deb [arch=amd64 signed-by=/usr/share/keyrings/docker-archive-keyring.gpg] https://download.docker.com/linux/ubuntu $(lsb_release -cs) stable
EOF

apt update
apt -y install containerd.io

containerd config default | tee /etc/containerd/config.toml
sed -i 's/SystemdCgroup = false/SystemdCgroup = true/' /etc/containerd/config.toml
systemctl restart containerd
`

const KUBE_TOOLS_SETUP = `
# kubeadm, kubelet and kubectl
curl -fsSL https://pkgs.k8s.io/core:/stable:/$KUBE_VERSION/deb/Release.key | gpg --dearmor -o /usr/share/keyrings/kubernetes-archive-keyring.gpg
tee /etc/apt/sources.list.d/kubernetes.list <<EOF
deb [arch=amd64 signed-by=/usr/share/keyrings/kubernetes-archive-keyring.gpg] https://pkgs.k8s.io/core:/stable:/$KUBE_VERSION/deb/ /
EOF

apt update
apt -y install kubelet kubeadm kubectl
`

// Kernel modules are pinned to the running kernel so no reboot is needed
const NVIDIA_SETUP = `
if lspci | grep -i nvidia; then
    apt install -y \\
        "linux-headers-$(uname -r)" \\
        "linux-modules-nvidia-$NVIDIA_DRIVER_VERSION-server-$(uname -r)" \\
        nvidia-utils-$NVIDIA_DRIVER_VERSION-server \\
        curl \\
        gnupg

    mkdir -p /etc/apt/keyrings

    curl -fsSL https://nvidia.github.io/libnvidia-container/gpgkey | gpg --dearmor > /etc/apt/keyrings/nvidia-container-toolkit-keyring.gpg
    curl -s -L https://nvidia.github.io/libnvidia-container/stable/deb/nvidia-container-toolkit.list | sed "s#deb https://#deb [signed-by=/etc/apt/keyrings/nvidia-container-toolkit-keyring.gpg] https://#g" > /etc/apt/sources.list.d/nvidia-container-toolkit.list

    apt update
    apt -y install nvidia-container-toolkit
    nvidia-ctk runtime configure --runtime=containerd --nvidia-set-as-default
    systemctl restart containerd
fi
`

const KUBEADM_INIT = `
IMDS_TOKEN="$(curl -sX PUT "http://169.254.169.254/latest/api/token" -H "X-aws-ec2-metadata-token-ttl-seconds: 3600")"
PUBLIC_IP=$(curl -s -H "X-aws-ec2-metadata-token: $IMDS_TOKEN" http://169.254.169.254/latest/meta-data/public-ipv4)

kubeadm init --pod-network-cidr=$POD_CIDR --service-cidr=$SERVICE_CIDR --apiserver-cert-extra-sans=$PUBLIC_IP
export KUBECONFIG=/etc/kubernetes/admin.conf

# Calico network plugin
kubectl apply -f "https://raw.githubusercontent.com/projectcalico/calico/$CALICO_VERSION/manifests/tigera-operator.yaml"

sleep 20

pushd /tmp
curl -O "https://raw.githubusercontent.com/projectcalico/calico/$CALICO_VERSION/manifests/custom-resources.yaml"
sed -i "s#cidr:.*#cidr: $POD_CIDR#g" custom-resources.yaml

kubectl create -f custom-resources.yaml
rm -f /tmp/custom-resources.yaml
`

function variables(vars: Record<string, string>): string {
    return Object.entries(vars)
        .map(([name, value]) => `${name}="${value}"`)
        .join("\n") + "\n"
}

export function renderMainUserData(args: MainUserDataArgs): string {
    return SCRIPT_HEADER
        + variables({
            KUBE_VERSION: args.kubernetesVersion,
            CALICO_VERSION: args.calicoVersion,
            POD_CIDR: args.podCidr,
            SERVICE_CIDR: args.serviceCidr,
        })
        + KERNEL_SETUP
        + CONTAINERD_SETUP
        + KUBE_TOOLS_SETUP
        + KUBEADM_INIT
}

export function renderWorkerUserData(args: WorkerUserDataArgs): string {
    return SCRIPT_HEADER
        + variables({
            KUBE_VERSION: args.kubernetesVersion,
            NVIDIA_DRIVER_VERSION: args.nvidiaDriverVersion,
        })
        + KERNEL_SETUP
        + CONTAINERD_SETUP
        + NVIDIA_SETUP
        + KUBE_TOOLS_SETUP
}

/**
 * Encode user data as expected by instance launch APIs
 */
export function encodeUserData(script: string): string {
    return Buffer.from(script, 'utf-8').toString('base64')
}
