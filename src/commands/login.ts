import Api from '../utils/api.js'
import login from '../utils/login.js'
import helper from '../utils/common.js'
import fileSys from '../utils/fileSys.js'

interface LoginOptions {
  config: string
}

export async function loginCommand({ config }: LoginOptions, signal: AbortSignal) {
  const setting = await fileSys.getAppSetting(config)

  setting.cookies = await login(new Api(), { signal })

  await fileSys.saveAppSetting(setting, config)
  helper.msg(`Cookies saved to ${config}`, 'success')
}
