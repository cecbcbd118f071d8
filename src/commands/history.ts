import helper from '../utils/common.js'
import History from '../utils/history.js'
import fileSys from '../utils/fileSys.js'

interface ExportOptions {
  config: string
}

export async function exportHistoryCommand(filePath: string, { config }: ExportOptions) {
  const setting = await fileSys.getAppSetting(config)
  const history = new History(setting.historyDb)

  try {
    const count = await history.exportExcel(filePath)
    helper.msg(`${count} history entries exported to ${filePath}`, 'success')
  } finally {
    history.close()
  }
}
