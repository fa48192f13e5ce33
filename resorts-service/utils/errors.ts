/**
 * 配置错误：缺少数据库连接串等。启动阶段抛出，服务无法继续运行。
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
