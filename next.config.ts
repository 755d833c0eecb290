import type { NextConfig } from 'next'

const nextConfig: NextConfig = {
  serverExternalPackages: ['mongodb', 'bcrypt', 'bwip-js'],
}

export default nextConfig
